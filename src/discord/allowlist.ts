export function parseAllowUserIds(raw: string | undefined): Set<string> {
  const out = new Set<string>();
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (!v) continue;
    if (/^\d+$/.test(v)) out.add(v);
  }
  return out;
}

export function isAllowlisted(allow: ReadonlySet<string>, userId: string): boolean {
  // Empty means nobody may delete, not everybody.
  if (allow.size === 0) return false;
  return allow.has(userId);
}

/**
 * Users who may delete a bot reply: whoever invoked the command plus the
 * configured moderators.
 */
export function deletionAllowlist(invokerId: string, moderatorIds: Iterable<string>): Set<string> {
  const out = new Set<string>(moderatorIds);
  out.add(invokerId);
  return out;
}
