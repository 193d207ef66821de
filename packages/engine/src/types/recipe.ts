import { z } from 'zod';
import type { FieldValidationError } from '../errors/mesh-error.js';

export const MAX_NAME_LENGTH = 120;
export const MAX_INGREDIENTS_LENGTH = 2000;
export const MAX_INSTRUCTIONS_LENGTH = 4000;
export const MAX_PUBLISHER_ID_LENGTH = 256;

/**
 * User-editable fields of a recipe, as accepted by `RecordStore.create`.
 *
 * Values are trimmed before the length checks run.
 */
export const recipeDraftSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'must not be empty')
    .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`),
  ingredients: z
    .string()
    .trim()
    .max(MAX_INGREDIENTS_LENGTH, `must be at most ${MAX_INGREDIENTS_LENGTH} characters`)
    .default(''),
  instructions: z
    .string()
    .trim()
    .max(MAX_INSTRUCTIONS_LENGTH, `must be at most ${MAX_INSTRUCTIONS_LENGTH} characters`)
    .default(''),
});

/** Input accepted by `create` (ingredients and instructions may be omitted) */
export type RecipeDraft = z.input<typeof recipeDraftSchema>;

/**
 * A stored or transmitted recipe.
 *
 * Unlike the draft schema this one does not trim: records received from a
 * peer are kept verbatim, they only have to respect the same bounds.
 */
export const recipeSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z
    .string()
    .max(MAX_NAME_LENGTH)
    .refine((value) => value.trim().length > 0, 'must not be empty'),
  ingredients: z.string().max(MAX_INGREDIENTS_LENGTH),
  instructions: z.string().max(MAX_INSTRUCTIONS_LENGTH),
  publisherId: z.string().min(1).max(MAX_PUBLISHER_ID_LENGTH),
  published: z.boolean(),
});

/**
 * One shared unit of data (a recipe), identified across the mesh by
 * `(publisherId, id)`.
 */
export interface Recipe {
  /** Allocated by the publishing node, unique per publisher */
  readonly id: number;
  readonly name: string;
  readonly ingredients: string;
  readonly instructions: string;
  /** Identity of the node that created the record */
  readonly publisherId: string;
  /** Whether the owner has broadcast this record */
  readonly published: boolean;
}

/**
 * Key used to deduplicate records across publishers.
 */
export function recordKey(record: Pick<Recipe, 'publisherId' | 'id'>): string {
  return `${record.publisherId}#${record.id}`;
}

/**
 * Whether a record was created by the node with the given identity.
 */
export function isOwnedBy(record: Recipe, localId: string): boolean {
  return record.publisherId === localId;
}

/**
 * Flatten zod issues into field-level validation errors.
 */
export function toFieldErrors(error: z.ZodError, prefix?: string): FieldValidationError[] {
  return error.issues.map((issue) => {
    const path = issue.path.map((segment) => String(segment)).join('.');
    return {
      path: prefix ? (path ? `${prefix}.${path}` : prefix) : path || '(root)',
      message: issue.message,
    };
  });
}
