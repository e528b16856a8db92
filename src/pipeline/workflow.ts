import { errorMessage } from '../utils/async.js';
import { logger } from '../utils/logger.js';
import {
  PipelineDeps,
  PipelineNode,
  authenticate,
  classify,
  discoverCourses,
  extractAssignments,
  generateReport,
} from './nodes.js';
import { PipelineState, RunOptions, applyUpdate, createInitialState } from './state.js';

const STAGES: ReadonlyArray<{ label: string; run: PipelineNode }> = [
  { label: 'Authenticating', run: authenticate },
  { label: 'Discovering courses', run: discoverCourses },
  { label: 'Extracting assignments', run: extractAssignments },
  { label: 'Classifying', run: classify },
  { label: 'Generating report', run: generateReport },
];

/**
 * Run the five stages in order. A stage never aborts the run: its errors are
 * appended and the next stage sees whatever state exists.
 */
export async function runPipeline(options: RunOptions, deps: PipelineDeps): Promise<PipelineState> {
  let state = createInitialState(options);

  for (const [index, stage] of STAGES.entries()) {
    logger.info(`[${index + 1}/${STAGES.length}] ${stage.label}...`);
    try {
      state = applyUpdate(state, await stage.run(state, deps));
    } catch (error) {
      logger.error(`${stage.label} failed: ${error}`);
      state = applyUpdate(state, { errors: [`${stage.label} failed: ${errorMessage(error)}`] });
    }
  }

  return state;
}
