/**
 * Split a drag-and-drop payload into individual raw paths.
 *
 * Two formats show up in practice:
 *   - Tk file lists: `{/music/my song.wav} /music/other.mp3`
 *   - text/uri-list: one `file://` URI per line, `#` lines are comments
 */
export function parseDropData(raw: string): string[] {
  const data = raw.trim();
  if (!data) return [];

  if (/[\r\n]/.test(data)) {
    return data
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  const paths: string[] = [];
  let i = 0;

  while (i < data.length) {
    const char = data[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '{') {
      const end = data.indexOf('}', i + 1);
      if (end === -1) {
        // Unterminated brace: take the rest as one path
        paths.push(data.slice(i + 1));
        break;
      }
      paths.push(data.slice(i + 1, end));
      i = end + 1;
      continue;
    }

    let end = i;
    while (end < data.length && !/\s/.test(data[end])) {
      end++;
    }
    paths.push(data.slice(i, end));
    i = end;
  }

  return paths.filter((p) => p.length > 0);
}
