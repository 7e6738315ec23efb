/** Split `<prefix><name> <args>` into its parts; null when the prefix does not match. */
export function parsePrefixCommand(content: string, prefix: string): { name: string; args: string } | null {
  const text = String(content ?? '').trim();
  if (!prefix || !text.startsWith(prefix)) return null;
  const rest = text.slice(prefix.length);
  const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
  if (!match?.[1]) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export function parseHelpCommand(content: string, prefix: string): true | null {
  const parsed = parsePrefixCommand(content, prefix);
  if (!parsed || parsed.name !== 'help' || parsed.args !== '') return null;
  return true;
}

export function handleHelpCommand(prefix: string, deletionEmojis: readonly string[]): string {
  return [
    '**Commands:**',
    '',
    `- \`${prefix}help\` — this message`,
    '',
    `React with ${deletionEmojis.join(' or ')} on a reply to delete it (command author and moderators only).`,
  ].join('\n');
}
