// @pixscript/channels — chat transport types and adapters

export * from './types.js';
export * from './telegram/adapter.js';
