/**
 * Tool argument schemas
 *
 * Arguments arrive as an untyped mapping; each tool parses them with zod
 * before touching the store. Failures here are malformed invocations.
 */

import { z } from "zod";
import { ToolArgumentError } from "./errors.js";

export type ToolArguments = Record<string, unknown>;

const INTEGER_MESSAGE = "must be a non-negative integer";
const RANGE_MESSAGE = "is out of range";
const STRING_MESSAGE = "must be a string";

// Clients may send the id as a number or as a string of digits. Ids past
// Number.MAX_SAFE_INTEGER are rejected rather than rounded to another row.
const MemoryId = z.union(
  [
    z
      .number()
      .int(INTEGER_MESSAGE)
      .nonnegative(INTEGER_MESSAGE)
      .max(Number.MAX_SAFE_INTEGER, RANGE_MESSAGE),
    z
      .string()
      .regex(/^\d+$/, INTEGER_MESSAGE)
      .transform((value, ctx) => {
        const id = Number(value);
        if (!Number.isSafeInteger(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: RANGE_MESSAGE });
          return z.NEVER;
        }
        return id;
      }),
  ],
  { errorMap: () => ({ message: INTEGER_MESSAGE }) }
);

const RequiredString = z.string({ invalid_type_error: STRING_MESSAGE });

// null counts as "not supplied"
const OptionalString = RequiredString.nullish().transform((value) => value ?? undefined);
const OptionalMemoryId = MemoryId.nullish().transform((value) => value ?? undefined);

export const RememberArgs = z.object({
  title: RequiredString,
  content: RequiredString,
});

export const GetMemoryArgs = z.object({
  memory_id: OptionalMemoryId,
  title: OptionalString,
});

export const UpdateMemoryArgs = z.object({
  memory_id: MemoryId,
  title: OptionalString,
  content: OptionalString,
});

export const DeleteMemoryArgs = z.object({
  memory_id: MemoryId,
});

/**
 * Parse tool arguments, throwing ToolArgumentError with the missing and
 * invalid fields listed.
 */
export function parseArguments<T extends z.ZodTypeAny>(
  tool: string,
  schema: T,
  args: ToolArguments
): z.output<T> {
  const result = schema.safeParse(args);
  if (result.success) {
    return result.data;
  }

  const missing: string[] = [];
  const invalid: string[] = [];
  for (const issue of result.error.issues) {
    const field = issue.path.join(".");
    if (args[field] === undefined) {
      if (!missing.includes(field)) {
        missing.push(field);
      }
    } else {
      const problem = `${field}: ${issue.message}`;
      if (!invalid.includes(problem)) {
        invalid.push(problem);
      }
    }
  }

  const problems = missing.length > 0 ? [`missing ${missing.join(", ")}`, ...invalid] : invalid;
  throw new ToolArgumentError(`Invalid arguments for ${tool}: ${problems.join("; ")}`);
}
