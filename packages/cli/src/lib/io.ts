/**
 * I/O helpers for CLI
 */

import { createInterface, type Interface } from "node:readline/promises";

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Ask a yes/no question on the terminal; only "y" confirms
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = await rl.question(`${question} (y/N) `);
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}

/**
 * Line reader over stdin; async-iterate it for lines, close it when done
 */
export function openLineReader(input: NodeJS.ReadableStream = process.stdin): Interface {
  return createInterface({ input, crlfDelay: Infinity });
}
