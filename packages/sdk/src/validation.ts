/**
 * Validation for book fields and ids
 */

import { z } from "zod";
import { BookValidationError } from "./errors.js";
import type { BookFields } from "./types.js";

/**
 * Trim and collapse runs of whitespace to one space
 */
export function collapseWhitespace(value: string): string {
  return value.trim().split(/\s+/).filter(Boolean).join(" ");
}

const requiredField = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .transform(collapseWhitespace)
    .pipe(z.string().min(1, `${label} must not be empty`));

const optionalField = z.string().default("").transform(collapseWhitespace);

/**
 * Book fields on insert and update
 *
 * Shelf, author and title are required; the rest default to "".
 */
export const BookDraftSchema = z
  .object({
    shelf: requiredField("shelf"),
    author: requiredField("author"),
    title: requiredField("title"),
    translator: optionalField,
    originalTitle: optionalField,
    borrowed: optionalField,
  })
  .strict();

/**
 * Validate and clean book fields
 *
 * @throws BookValidationError listing every failing field
 */
export function validateBookDraft(input: unknown): BookFields {
  const result = BookDraftSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new BookValidationError(issues, { cause: result.error });
  }
  return result.data;
}

const ID_PATTERN = /^[1-9]\d*$/;

/**
 * Parse a book id from user input
 *
 * @throws BookValidationError unless `value` is a positive integer
 */
export function parseBookId(value: string | number): number {
  const text = String(value).trim();
  const id = Number(text);
  if (!ID_PATTERN.test(text) || !Number.isSafeInteger(id)) {
    throw new BookValidationError([`id must be a positive integer: "${text}"`]);
  }
  return id;
}
