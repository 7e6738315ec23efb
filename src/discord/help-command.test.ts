import { describe, it, expect } from 'vitest';
import { handleHelpCommand, parseHelpCommand, parsePrefixCommand } from './help-command.js';

describe('parsePrefixCommand', () => {
  it('splits the name and arguments', () => {
    expect(parsePrefixCommand('?issue 42 extra', '?')).toEqual({ name: 'issue', args: '42 extra' });
  });

  it('lowercases the command name only', () => {
    expect(parsePrefixCommand('?HELP Me', '?')).toEqual({ name: 'help', args: 'Me' });
  });

  it('returns null without the prefix or without a name', () => {
    expect(parsePrefixCommand('help', '?')).toBeNull();
    expect(parsePrefixCommand('?', '?')).toBeNull();
    expect(parsePrefixCommand('? help', '?')).toBeNull();
    expect(parsePrefixCommand('', '?')).toBeNull();
  });

  it('supports multi-character prefixes', () => {
    expect(parsePrefixCommand('gh!help', 'gh!')).toEqual({ name: 'help', args: '' });
  });
});

describe('parseHelpCommand', () => {
  it('matches the help command exactly', () => {
    expect(parseHelpCommand('?help', '?')).toBe(true);
    expect(parseHelpCommand('  ?Help  ', '?')).toBe(true);
  });

  it('rejects extra content and other commands', () => {
    expect(parseHelpCommand('?helping', '?')).toBeNull();
    expect(parseHelpCommand('?help me', '?')).toBeNull();
    expect(parseHelpCommand('!help', '?')).toBeNull();
    expect(parseHelpCommand('hello', '?')).toBeNull();
  });
});

describe('handleHelpCommand', () => {
  it('lists commands with the configured prefix and deletion emojis', () => {
    expect(handleHelpCommand('!', ['🗑️', '❌'])).toBe(
      [
        '**Commands:**',
        '',
        '- `!help` — this message',
        '',
        'React with 🗑️ or ❌ on a reply to delete it (command author and moderators only).',
      ].join('\n'),
    );
  });
});
