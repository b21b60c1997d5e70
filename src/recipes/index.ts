export { RecipeBook, type RecipeBookOptions } from './recipe-book.js';
export * from './stores/index.js';
export type * from './types.js';
