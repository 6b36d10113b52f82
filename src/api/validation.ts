// ---------------------------------------------------------------------------
// Request validation with zod.
// ---------------------------------------------------------------------------

import path from "node:path";
import { z } from "zod";
import { InvalidRequestError } from "../core/errors.js";

/** A non-blank directory path, resolved against the server's cwd. */
export const DirectorySchema = z
  .string({ required_error: "directory is required" })
  .trim()
  .min(1, "directory must not be empty")
  .transform((dir) => path.resolve(dir));

export const DirectoryBodySchema = z.object({ directory: DirectorySchema });

export const DirectoryQuerySchema = z.object({ directory: DirectorySchema });

export const GenresQuerySchema = z.object({
  directory: DirectorySchema,
  filter: z.string().optional(),
});

export const DeleteQuerySchema = z.object({
  directory: DirectorySchema,
  confirm: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

export const GenreParamSchema = z
  .string()
  .trim()
  .min(1, "genre must not be empty");

/**
 * Parse `input` with `schema`.
 *
 * @throws InvalidRequestError listing every issue as `path: message`.
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidRequestError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }
  return result.data;
}
