export * from './browser-session.js';
export * from './flash.js';
