export * from './pixel-buffer.js';
export * from './projection-image.js';
export * from './camera-image.js';
export * from './double-camera-image.js';
export * from './panorama-image.js';
