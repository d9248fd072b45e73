export { InputValidationError } from './input-validation-error';
export { PatternCompileError } from './pattern-compile-error';
