export { makeScanAccumulator, type ScanAccumulator, type Verdict } from './ScanAccumulator.js';
export { traverseSource, type FragmentSource } from './traverseSource.js';
export {
  type DriverOptions,
  type GateMode,
  type InvalidEntry,
  type ScanResults,
  type SourceItem,
} from './types.js';
