export { Labeler, keepLongest, sortLabelings, spanText } from './Labeler';
export type { Labeling, LabelResult, LabelerOptions } from './Labeler';
