export type { BarSegment, LayoutOptions, PixelRect } from './layout';
export { layoutLayer, scaleSegments } from './layout';
