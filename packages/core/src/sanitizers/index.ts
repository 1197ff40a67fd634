export * from './types.js';
export * from './policy.js';
export { noopSanitizer } from './noop.js';
export { dompurifySanitizer } from './dompurify.js';
export {
  DEFAULT_SANITIZERS,
  getSanitizer,
  listSanitizers,
  resolveSanitizers,
} from './registry.js';
