export { AudioSinkNode, isActiveInHierarchy, type AudioOutput, type AudioSinkNodeOptions } from './AudioSinkNode';
export {
  AudioSinkArbiter,
  type ArbitrationResult,
  type ArbitrationRule,
  type AudioSinkArbiterOptions,
  type AudioSinkCandidate,
} from './AudioSinkArbiter';
