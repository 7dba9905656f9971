export {
  ShapeTracker,
  type AxisRange,
  type ConcreteRange,
  type ResolvedTracker,
} from './shape-tracker';
