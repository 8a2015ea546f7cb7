/**
 * Formats "hash|message|author|date" for inclusion in a merge message. The
 * subject may itself contain '|', so author and date are taken from the end.
 */
export function formatCommitInfo(info: string): string {
  const parts = info.trim().split('|');
  if (parts.length < 4) {
    return `\n\nMerge commit: ${info.trim()}`;
  }

  const hash = parts[0].slice(0, 8);
  const date = parts[parts.length - 1];
  const author = parts[parts.length - 2];
  const message = parts.slice(1, -2).join('|');

  return `\n\nMerge commit: ${hash}\nMessage: ${message}\nAuthor: ${author}\nDate: ${date}`;
}
