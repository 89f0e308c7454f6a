export {
  rectilinear,
  equisolid,
  equidistant,
  orthographic,
  stereographic,
  thoby,
  LENSES,
  getLens,
  type Lens,
  type LensFunction,
} from './lens.js';
