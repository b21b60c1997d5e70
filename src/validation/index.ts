export {
  ValidationError,
  isValidationError,
  LIMITS,
  ROLES,
  validateUsername,
  validatePassword,
  validateRole,
  validateRecipeTitle,
  validateInstructions,
  validatePrepTime,
  validateIngredient,
  validateCategoryName,
  type Role,
  type ValidationErrorCode,
} from './validator.js';
