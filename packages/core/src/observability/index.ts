export { withSpan } from './tracing.js';
