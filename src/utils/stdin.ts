/** Everything piped to stdin, or '' when stdin is a terminal. */
export async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';

  process.stdin.setEncoding('utf-8');
  let data = '';
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

/** Parsed JSON from stdin; null for empty or malformed input. */
export async function readStdinJson(): Promise<unknown> {
  const raw = (await readStdin()).trim();
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
