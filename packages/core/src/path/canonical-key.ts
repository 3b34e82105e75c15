/**
 * Extensions that begin with `s` without it marking compression. Every other
 * extension starting with `s` names the Yaz0-compressed form of the
 * extension that follows it (`.sbactorpack`, `.shksc`, `.ssarc`).
 */
export const PLAIN_S_EXTENSIONS: ReadonlySet<string> = new Set(['sarc', 'stats', 'stera']);

function extensionOf(path: string): string | undefined {
  const slash = path.lastIndexOf('/');
  const dot = path.lastIndexOf('.');
  return dot > slash ? path.slice(dot + 1) : undefined;
}

/** Whether a file of this name is stored Yaz0-compressed. */
export function isCompressedName(path: string): boolean {
  const ext = extensionOf(path.replaceAll('\\', '/'));
  return ext !== undefined && ext.length > 1 && ext.startsWith('s') && !PLAIN_S_EXTENSIONS.has(ext);
}

/**
 * Resource-table key for a path: `/` separators, no leading slash, and the
 * compression marker removed from the extension.
 */
export function canonicalKey(path: string): string {
  const normalized = path.replaceAll('\\', '/').replace(/^\/+/, '');
  if (!isCompressedName(normalized)) return normalized;
  const dot = normalized.lastIndexOf('.');
  return `${normalized.slice(0, dot + 1)}${normalized.slice(dot + 2)}`;
}
