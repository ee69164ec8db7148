export { Vec2, degToRad } from './vec2.js';
export { Box2 } from './box2.js';
