export { Rotation, rotationMatrix } from './rotation.js';
