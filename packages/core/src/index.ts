// @pixscript/core — sessions, message lifecycle and generation for the image bot

export * from './config/schema.js';
export * from './config/loader.js';
export * from './errors/kinds.js';
export * from './errors/errors.js';
export * from './errors/messages.js';
export * from './errors/classifier.js';
export * from './language/detector.js';
export * from './variation/token-generator.js';
export * from './session/types.js';
export * from './session/transitions.js';
export * from './session/keyed-mutex.js';
export * from './session/store.js';
export * from './lifecycle/message-lifecycle.js';
export * from './image/types.js';
export * from './image/openai.js';
export * from './image/gemini.js';
export * from './image/factory.js';
export * from './generation/types.js';
export * from './generation/coordinator.js';
