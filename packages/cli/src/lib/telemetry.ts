/**
 * Per-command timing metrics, printed to stderr when BOOKSHELF_CLI_DEBUG=1
 *
 *   metric cli.search duration_ms=4 success=true db=/home/ana/books.sqlite3 results=2
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

type TagValue = string | number | boolean;

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: TagValue): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format one metric line (without the trailing newline)
 */
export function formatMetric(key: string, fields: ReadonlyMap<string, TagValue>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [name, value] of fields) {
    parts.push(`${sanitizeMetricPart(name)}=${sanitizeMetricPart(value)}`);
  }
  return parts.join(" ");
}

/**
 * Collects tags for one command run; `finish` emits the metric
 */
export class CommandTimer {
  readonly #label: string;
  readonly #start = Date.now();
  readonly #tags = new Map<string, TagValue>();

  constructor(label: string) {
    this.#label = label;
  }

  /** Attach a tag, e.g. the catalog path or a result count */
  tag(name: string, value: TagValue): void {
    this.#tags.set(name, value);
  }

  finish(success: boolean): void {
    if (!isVerbose()) {
      return;
    }
    const fields = new Map<string, TagValue>([
      ["duration_ms", Date.now() - this.#start],
      ["success", success],
      ...this.#tags,
    ]);
    writeStderr(formatMetric(this.#label, fields) + "\n");
  }
}

/**
 * Run a command body under a timer; the metric is emitted on success and failure
 */
export async function withTiming<T>(
  label: string,
  fn: (timer: CommandTimer) => Promise<T>
): Promise<T> {
  const timer = new CommandTimer(label);
  let success = false;

  try {
    const result = await fn(timer);
    success = true;
    return result;
  } finally {
    timer.finish(success);
  }
}
