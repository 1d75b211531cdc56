import { z, ZodError } from 'zod';
import { type FieldErrors, ValidationError } from './errors';

export const MIN_COOKING_TIME = 1;
export const MAX_COOKING_TIME = 32000;
export const MIN_INGREDIENT_AMOUNT = 1;
export const MAX_INGREDIENT_AMOUNT = 32000;
export const MIN_PASSWORD_LENGTH = 8;

const NON_FIELD = 'non_field_errors';

export const uuidSchema = z.string().uuid('Must be a valid UUID');

const nameField = (max: number) =>
  z.string().trim().min(1, 'This field may not be blank').max(max, `Ensure this field has no more than ${max} characters`);

export const registrationSchema = z.object({
  email: z.string().trim().toLowerCase().email('Enter a valid email address').max(254),
  username: nameField(150).regex(/^[\w.@+-]+$/, 'Username may contain only letters, digits and @/./+/-/_'),
  first_name: nameField(150),
  last_name: nameField(150),
  password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`).max(128),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1),
  password: z.string().min(1),
});

export const setPasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`).max(128),
});

export const avatarSchema = z.object({
  avatar: z.string().min(1, 'Avatar is required'),
});

// Numbers and numeric strings only; booleans and arrays are rejected
const integerInput = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'A valid integer is required'),
]);

const ingredientAmountSchema = z.object({
  id: uuidSchema,
  amount: integerInput.pipe(
    z.coerce
      .number()
      .int('Amount must be a whole number')
      .min(MIN_INGREDIENT_AMOUNT, `Amount must be at least ${MIN_INGREDIENT_AMOUNT}`)
      .max(MAX_INGREDIENT_AMOUNT, `Amount must not exceed ${MAX_INGREDIENT_AMOUNT}`)
  ),
});

const cookingTimeSchema = integerInput.pipe(
  z.coerce
    .number()
    .int('Cooking time must be a whole number of minutes')
    .min(MIN_COOKING_TIME, `Cooking time must be at least ${MIN_COOKING_TIME} minute`)
    .max(MAX_COOKING_TIME, `Cooking time must not exceed ${MAX_COOKING_TIME} minutes`)
);

const recipeSets = {
  ingredients: z.array(ingredientAmountSchema).min(1, 'Add at least one ingredient'),
  tags: z.array(uuidSchema).min(1, 'Choose at least one tag'),
};

export const recipeCreateSchema = z.object({
  ...recipeSets,
  image: z.string().min(1, 'Image is required'),
  name: nameField(256),
  text: z.string().trim().min(1, 'This field may not be blank'),
  cooking_time: cookingTimeSchema,
});

export const recipeUpdateSchema = z.object({
  ...recipeSets,
  image: z.string().min(1, 'Image may not be empty').optional(),
  name: nameField(256).optional(),
  text: z.string().trim().min(1, 'This field may not be blank').optional(),
  cooking_time: cookingTimeSchema.optional(),
});

export type RegistrationInput = z.infer<typeof registrationSchema>;
export type RecipeCreateInput = z.infer<typeof recipeCreateSchema>;
export type RecipeUpdateInput = z.infer<typeof recipeUpdateSchema>;

export function fieldErrors(error: ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : NON_FIELD;
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid request data', fieldErrors(result.error));
  }
  return result.data;
}

/** A query parameter that may appear at most once. */
export function singleQueryValue(value: string | string[] | undefined, field: string): string | undefined {
  if (Array.isArray(value)) {
    throw ValidationError.forField(field, `Pass ${field} only once`);
  }
  return value;
}

export function parseId(value: string, label = 'id'): string {
  const result = uuidSchema.safeParse(value);
  if (!result.success) {
    throw ValidationError.forField(label, `Invalid ${label} format`);
  }
  return result.data;
}
