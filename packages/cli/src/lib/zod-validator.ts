import type { z } from "zod";

/**
 * Turns a Zod schema into a prompt validator.
 * Returns the first error message, or undefined when the value is valid.
 */
export function check<T extends z.ZodType>(schema: T) {
  return (value: unknown): string | undefined => {
    const result = schema.safeParse(value);
    if (!result.success) return result.error.issues[0]?.message;
    return;
  };
}
