export * from './contracts/glyph-renderer.js';
export * from './contracts/timer-scheduler.js';
export * from './entities/playback-scheduler.js';
export * from './value-objects/avatar-configuration.js';
export * from './value-objects/frame.js';
export * from './value-objects/frame-source.js';
