export { Constant, type ConstantParams } from './constant-block.js';
export { Generator, type GeneratorFn } from './generator-block.js';
