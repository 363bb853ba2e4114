export { Print, type PrintSink } from './print-block.js';
export { Probe, addProbe, type ProbeFn } from './probe-block.js';
export { Recorder, type Sample } from './recorder-block.js';
export { StopWhen, type StopPredicate } from './stop-when-block.js';
