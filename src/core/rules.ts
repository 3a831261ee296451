/**
 * CORE: Transition rules
 * Pure validation logic.
 */

import { Action } from './machine';
import { PipelineState } from './state';

export function validateAction(state: PipelineState, action: Action): void {
    if (state.status === 'completed' || state.status === 'failed') {
        throw new Error(`Cannot ${action.type} in state: ${state.status}`);
    }

    const index = state.stages.findIndex(s => s.id === action.stageId);
    if (index === -1) {
        throw new Error(`Unknown stage: ${action.stageId}`);
    }

    switch (action.type) {
        case 'STAGE_STARTED':
        case 'STAGE_SKIPPED':
            // Stages run in declared order: the next one is always cursor + 1
            if (index !== state.cursor + 1) {
                const expected = state.stages[state.cursor + 1]?.id ?? '(none)';
                throw new Error(`Out-of-order stage ${action.stageId}: expected ${expected}`);
            }
            if (state.cursor >= 0 && state.stages[state.cursor].status === 'running') {
                throw new Error(`Stage ${state.stages[state.cursor].id} is still running`);
            }
            break;

        case 'STAGE_SUCCEEDED':
        case 'STAGE_WARNED':
        case 'STAGE_FAILED':
            if (index !== state.cursor || state.stages[index].status !== 'running') {
                throw new Error(`Cannot ${action.type}: stage ${action.stageId} is not running`);
            }
            break;
    }
}
