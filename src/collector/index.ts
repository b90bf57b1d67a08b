export {
  OutputCollector,
  findOutputs,
  DEFAULT_OUTPUT_PATTERNS,
  type CollectOptions,
} from './output-collector.js';
