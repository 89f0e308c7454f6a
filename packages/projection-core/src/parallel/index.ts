export { partitionRows, forEachRowRange, type RowKernel } from './row-partition.js';
