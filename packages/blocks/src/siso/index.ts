export { PID, PIDParamsSchema, type PIDParams, type PIDParamsInput } from './pid-block.js';
