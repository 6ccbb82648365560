/**
 * @kqlrun/transform - Output transform expressions (JMESPath)
 *
 * @packageDocumentation
 * @module @kqlrun/transform
 */

export {
  CompiledTransform,
  compileTransform,
  applyTransform,
  normalizeExpression,
} from './transform.js';
