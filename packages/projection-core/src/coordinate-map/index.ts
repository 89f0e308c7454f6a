export {
  createCoordinateMap,
  cloneCoordinateMap,
  coordinateMapFromPoints,
  getCell,
  setCell,
  isInvalidCell,
  flipLatitude,
  normalizeCoordinateMap,
  coordinateMapToImage,
  type CoordinateCell,
} from './coordinate-map.js';
