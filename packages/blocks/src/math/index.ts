export { Add, AddParamsSchema, type AddParams } from './add-block.js';
export { Delay, type DelayParams } from './delay-block.js';
