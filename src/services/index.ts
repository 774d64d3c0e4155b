export {
  buildExpectedFiles,
  buildOutputFiles,
  checkFileExistence,
  loadAllFiles,
  plannedOutputs,
  type LoadResult,
  validateOutputFiles
} from './fileDiscovery.js';

export { runPipeline, type RunContext, type RunResult } from './pipeline.js';
