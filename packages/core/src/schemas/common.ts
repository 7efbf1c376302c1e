/**
 * Field schemas for registry entries.
 */

import { z } from "zod";

// =============================================================================
// Repository name
// =============================================================================

// Characters GitHub accepts in owner and repository names
const SEGMENT = "[A-Za-z0-9._-]+";
export const REPOSITORY_NAME_REGEX = new RegExp(`^${SEGMENT}/${SEGMENT}$`);
const NAME_ERROR =
  'Must be "{owner}/{repo}" with exactly one "/" and non-empty segments (e.g., Acme/my-mod)';

/**
 * Schema for the `name` field.
 * - Exactly one slash
 * - Owner and repository segments made of letters, digits, ".", "_" or "-"
 */
export const repositoryNameSchema = z
  .string()
  .regex(REPOSITORY_NAME_REGEX, NAME_ERROR);

// =============================================================================
// Display fields
// =============================================================================

/**
 * Schema for `custom_name`, the label shown to players.
 */
export const customNameSchema = z
  .string()
  .refine((value) => value.trim().length > 0, {
    message: "custom_name must not be empty",
  });

/**
 * Schema for the optional `description`. Consumers fall back to the
 * repository description on the hosting platform when it is absent.
 */
export const descriptionSchema = z.string();

// =============================================================================
// URL
// =============================================================================

export const repositoryUrlSchema = z.string().url("Must be a well-formed URL");

// =============================================================================
// Entry
// =============================================================================

export const registryEntrySchema = z.object({
  name: repositoryNameSchema,
  custom_name: customNameSchema,
  description: descriptionSchema.optional(),
  url: repositoryUrlSchema,
});
