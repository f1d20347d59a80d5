export type { StepMachine, TransitionResult } from './step-machine.js';
export { describeState } from './step-machine.js';
export type { Checkpoint } from './checkpoint.js';
export { decodeCheckpoint } from './checkpoint.js';
export type { StateCodecError } from './state-codec.js';
export { encodeState, decodeState } from './state-codec.js';
export { formatErrorChain, toError } from './error-chain.js';
export type { EngineError, EngineErrorKind } from './engine-error.js';
export { engineErrorKind, formatEngineError } from './engine-error.js';
export type { EnginePhase, ResumableEngineOptions } from './engine.js';
export { ResumableEngine } from './engine.js';
