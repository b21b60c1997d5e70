/**
 * Input validation
 *
 * Pure functions that normalize raw text and numbers before they reach
 * storage. Each returns the normalized value or throws ValidationError with
 * a message meant to be shown to the user as-is.
 */

export type ValidationErrorCode =
  | 'USERNAME_INVALID'
  | 'PASSWORD_INVALID'
  | 'ROLE_INVALID'
  | 'TITLE_INVALID'
  | 'INSTRUCTIONS_INVALID'
  | 'PREP_TIME_INVALID'
  | 'INGREDIENT_INVALID'
  | 'CATEGORY_NAME_INVALID'
  | 'INGREDIENTS_REQUIRED'
  | 'DUPLICATE_USERNAME'
  | 'ADMIN_PASSPHRASE_INVALID'
  | 'SELF_DELETE';

/** Caller-correctable input error */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly field?: string;

  constructor(code: ValidationErrorCode, message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.field = field;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      field: this.field,
    };
  }
}

/** Type guard for ValidationError */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

// =============================================================================
// Limits
// =============================================================================

export const LIMITS = {
  usernameMin: 3,
  usernameMax: 50,
  passwordMin: 6,
  passwordMax: 100,
  titleMax: 200,
  instructionsMax: 65_535,
  prepTimeMax: 1440,
  ingredientMax: 100,
  quantityMax: 50,
  categoryNameMax: 100,
} as const;

export const ROLES = ['user', 'admin'] as const;
export type Role = (typeof ROLES)[number];

const USERNAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// =============================================================================
// Accounts
// =============================================================================

export function validateUsername(username: string): string {
  const value = username.trim();

  if (!value) {
    throw new ValidationError('USERNAME_INVALID', 'Username cannot be empty', 'username');
  }
  if (value.length < LIMITS.usernameMin) {
    throw new ValidationError('USERNAME_INVALID', `Username must be at least ${LIMITS.usernameMin} characters long`, 'username');
  }
  if (value.length > LIMITS.usernameMax) {
    throw new ValidationError('USERNAME_INVALID', `Username cannot exceed ${LIMITS.usernameMax} characters`, 'username');
  }
  if (!USERNAME_PATTERN.test(value)) {
    throw new ValidationError(
      'USERNAME_INVALID',
      'Username can only contain letters, numbers, underscores, and hyphens',
      'username'
    );
  }

  return value;
}

/** Passwords are not trimmed; whitespace is part of the secret. */
export function validatePassword(password: string): string {
  if (!password) {
    throw new ValidationError('PASSWORD_INVALID', 'Password cannot be empty', 'password');
  }
  if (password.length < LIMITS.passwordMin) {
    throw new ValidationError('PASSWORD_INVALID', `Password must be at least ${LIMITS.passwordMin} characters long`, 'password');
  }
  if (password.length > LIMITS.passwordMax) {
    throw new ValidationError('PASSWORD_INVALID', `Password cannot exceed ${LIMITS.passwordMax} characters`, 'password');
  }

  return password;
}

export function validateRole(role: string): Role {
  const match = ROLES.find(r => r === role);
  if (!match) {
    throw new ValidationError('ROLE_INVALID', `Role must be one of: ${ROLES.join(', ')}`, 'role');
  }
  return match;
}

// =============================================================================
// Recipes
// =============================================================================

export function validateRecipeTitle(title: string): string {
  const value = title.trim();

  if (!value) {
    throw new ValidationError('TITLE_INVALID', 'Recipe title cannot be empty', 'title');
  }
  if (value.length > LIMITS.titleMax) {
    throw new ValidationError('TITLE_INVALID', `Recipe title cannot exceed ${LIMITS.titleMax} characters`, 'title');
  }

  return value;
}

export function validateInstructions(instructions: string): string {
  const value = instructions.trim();

  if (!value) {
    throw new ValidationError('INSTRUCTIONS_INVALID', 'Instructions cannot be empty', 'instructions');
  }
  if (value.length > LIMITS.instructionsMax) {
    throw new ValidationError(
      'INSTRUCTIONS_INVALID',
      'Instructions are too long (maximum 65,535 characters)',
      'instructions'
    );
  }

  return value;
}

/**
 * Preparation time in minutes. Accepts a number or the raw text of a form field.
 */
export function validatePrepTime(prepTime: string | number): number {
  let minutes: number;

  if (typeof prepTime === 'number') {
    if (!Number.isInteger(prepTime)) {
      throw new ValidationError('PREP_TIME_INVALID', 'Preparation time must be a valid number', 'prepTime');
    }
    minutes = prepTime;
  } else {
    const text = prepTime.trim();
    if (!text) {
      throw new ValidationError('PREP_TIME_INVALID', 'Preparation time cannot be empty', 'prepTime');
    }
    if (!INTEGER_PATTERN.test(text)) {
      throw new ValidationError('PREP_TIME_INVALID', 'Preparation time must be a valid number', 'prepTime');
    }
    minutes = Number.parseInt(text, 10);
  }

  if (minutes <= 0) {
    throw new ValidationError('PREP_TIME_INVALID', 'Preparation time must be a positive number', 'prepTime');
  }
  if (minutes > LIMITS.prepTimeMax) {
    throw new ValidationError(
      'PREP_TIME_INVALID',
      'Preparation time cannot exceed 24 hours (1440 minutes)',
      'prepTime'
    );
  }

  return minutes;
}

export function validateIngredient(
  ingredient: string | null | undefined,
  quantity: string | null | undefined
): { name: string; quantity: string } {
  const name = ingredient?.trim() ?? '';
  const amount = quantity?.trim() ?? '';

  if (!name) {
    throw new ValidationError('INGREDIENT_INVALID', 'Ingredient name cannot be empty', 'ingredient');
  }
  if (name.length > LIMITS.ingredientMax) {
    throw new ValidationError(
      'INGREDIENT_INVALID',
      `Ingredient name is too long (maximum ${LIMITS.ingredientMax} characters)`,
      'ingredient'
    );
  }
  if (amount.length > LIMITS.quantityMax) {
    throw new ValidationError(
      'INGREDIENT_INVALID',
      `Quantity description is too long (maximum ${LIMITS.quantityMax} characters)`,
      'quantity'
    );
  }

  return { name, quantity: amount };
}

export function validateCategoryName(name: string): string {
  const value = name.trim();

  if (!value) {
    throw new ValidationError('CATEGORY_NAME_INVALID', 'Category name cannot be empty', 'name');
  }
  if (value.length > LIMITS.categoryNameMax) {
    throw new ValidationError(
      'CATEGORY_NAME_INVALID',
      `Category name cannot exceed ${LIMITS.categoryNameMax} characters`,
      'name'
    );
  }

  return value;
}
