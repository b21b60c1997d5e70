export { CategoryStore } from './category-store.js';
export { ActivityStore } from './activity-store.js';
export { RecipeStore, type RecipeStoreOptions } from './recipe-store.js';
export { CredentialStore } from './credential-store.js';
export { ReportStore, type ReportStoreOptions } from './report-store.js';
