export { DistanceMatrix } from './distance-matrix.js'
export { buildDistanceMatrix } from './distance-matrix-builder.js'
export type { DistanceMatrixBuildOptions } from './distance-matrix-builder.js'
