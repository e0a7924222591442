/**
 * Backend option validation.
 */

import { z } from "zod";
import { GrammarError } from "./errors";

/**
 * Parse backend options with a zod schema, reporting the first offending path
 * as a GrammarError.
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  owner: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length ? issue.path.join(".") : "(root)";
    throw new GrammarError(`Invalid ${owner} option ${path}: ${issue.message}`, path);
  }
  return result.data;
}
