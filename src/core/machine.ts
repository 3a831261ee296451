/**
 * CORE: Pipeline State Machine Reducer
 * Pure function: (State, Action) -> State
 * The reducer validates transitions and throws on invalid ones.
 */

import { PipelineState, StageRecord, StageStatus } from './state';
import { validateAction } from './rules';

export type Action =
    | { type: 'STAGE_STARTED'; stageId: string; timestamp: number }
    | { type: 'STAGE_SKIPPED'; stageId: string; reason: string; timestamp: number }
    | { type: 'STAGE_SUCCEEDED'; stageId: string; summary?: string; timestamp: number }
    | { type: 'STAGE_WARNED'; stageId: string; message: string; timestamp: number }
    | { type: 'STAGE_FAILED'; stageId: string; message: string; errorName: string; timestamp: number };

function updateStage(stages: StageRecord[], index: number, patch: Partial<StageRecord>): StageRecord[] {
    return stages.map((s, i) => (i === index ? { ...s, ...patch } : s));
}

function settle(state: PipelineState, index: number, status: StageStatus, detail: string | undefined, now: number): PipelineState {
    const stages = updateStage(state.stages, index, { status, detail, finishedAt: now });
    const isLast = index === state.stages.length - 1;
    return {
        ...state,
        stages,
        cursor: index,
        status: isLast ? 'completed' : 'running',
        updatedAt: now,
    };
}

export function reducer(state: PipelineState, action: Action): PipelineState {
    validateAction(state, action);
    const now = action.timestamp;
    const index = state.stages.findIndex(s => s.id === action.stageId);

    switch (action.type) {
        case 'STAGE_STARTED':
            return {
                ...state,
                status: 'running',
                cursor: index,
                stages: updateStage(state.stages, index, { status: 'running', startedAt: now }),
                updatedAt: now,
            };

        case 'STAGE_SKIPPED':
            return settle(state, index, 'skipped', action.reason, now);

        case 'STAGE_SUCCEEDED':
            return settle(state, index, 'succeeded', action.summary, now);

        case 'STAGE_WARNED':
            return settle(state, index, 'warned', action.message, now);

        case 'STAGE_FAILED': {
            const stage = state.stages[index];
            return {
                ...state,
                status: 'failed',
                cursor: index,
                stages: updateStage(state.stages, index, { status: 'failed', detail: action.message, finishedAt: now }),
                failure: {
                    stageId: stage.id,
                    label: stage.label,
                    position: index + 1,
                    message: action.message,
                    errorName: action.errorName,
                },
                updatedAt: now,
            };
        }

        default:
            return state;
    }
}
