import fs from 'fs';

// git appends everything below this line for `commit --verbose`
const SCISSORS_LINE = '# ------------------------ >8 ------------------------';

export function readMessage(file?: string): string {
  if (file) {
    return fs.readFileSync(file, 'utf-8');
  }
  if (process.stdin.isTTY) {
    throw new Error('No commit message given; pass a file or pipe the message on stdin');
  }
  return fs.readFileSync(0, 'utf-8');
}

/**
 * Removes git comment lines, and everything from the scissors line down.
 */
export function stripComments(message: string): string {
  const lines = message.replace(/\r\n?/g, '\n').split('\n');
  const scissors = lines.indexOf(SCISSORS_LINE);
  const kept = scissors === -1 ? lines : lines.slice(0, scissors);

  return kept.filter((line) => !line.startsWith('#')).join('\n');
}
