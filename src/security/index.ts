export {
  BcryptPasswordHasher,
  Sha256PasswordHasher,
  createPasswordHasher,
  type PasswordHasher,
} from './password-hasher.js';
export { AdminGate } from './admin-gate.js';
