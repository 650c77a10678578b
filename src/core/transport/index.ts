/**
 * Transport module entry point
 */

export * from './ssh-transport.js';
export * from './tools.js';
export * from './remote-script.js';
