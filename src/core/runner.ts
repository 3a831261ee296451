/**
 * CORE: Pipeline runner
 * Executes named stages in declared order, feeding every transition through the reducer.
 * Halts on the first non-advisory failure and records which stage failed.
 */

import { BootstrapLogger } from './logger';
import { Action, reducer } from './machine';
import { PipelineState, createInitialState } from './state';
import { errorMessage } from './errors';

export interface Stage<C> {
    id: string;
    label: string;
    /** Advisory stages warn and continue on error (teardown on a first run has nothing to remove). */
    advisory?: boolean;
    /** Return a reason to skip the stage, or null to run it. */
    skip?: (ctx: C) => string | null;
    /** Resolves with an optional one-line summary. */
    run: (ctx: C) => Promise<string | void>;
}

export interface PipelineDefinition<C> {
    name: string;
    stages: Stage<C>[];
}

export interface RunHooks {
    logger: BootstrapLogger;
    /** Called after every transition, e.g. to persist the state. */
    onTransition?: (state: PipelineState) => Promise<void>;
    now?: () => number;
}

export interface PipelineResult {
    state: PipelineState;
    error?: Error;
}

export const createPipeline = <C>(name: string, stages: Stage<C>[]): PipelineDefinition<C> => {
    const ids = new Set<string>();
    for (const stage of stages) {
        if (ids.has(stage.id)) {
            throw new Error(`Duplicate stage id in pipeline ${name}: ${stage.id}`);
        }
        ids.add(stage.id);
    }
    return { name, stages };
};

export async function runPipeline<C>(
    pipeline: PipelineDefinition<C>,
    ctx: C,
    hooks: RunHooks
): Promise<PipelineResult> {
    const { logger } = hooks;
    const now = hooks.now ?? Date.now;
    const total = pipeline.stages.length;
    let state = createInitialState(pipeline.stages, now());

    const dispatch = async (action: Action) => {
        state = reducer(state, action);
        if (hooks.onTransition) await hooks.onTransition(state);
    };

    for (let i = 0; i < total; i++) {
        const stage = pipeline.stages[i];
        const marker = `[${i + 1}/${total}]`;

        const skipReason = stage.skip ? stage.skip(ctx) : null;
        if (skipReason) {
            logger.info(`\n${marker} Skipping ${stage.label} (${skipReason})`);
            await dispatch({ type: 'STAGE_SKIPPED', stageId: stage.id, reason: skipReason, timestamp: now() });
            continue;
        }

        logger.info(`\n${marker} ${stage.label}...`);
        await dispatch({ type: 'STAGE_STARTED', stageId: stage.id, timestamp: now() });

        let summary: string | void;
        try {
            summary = await stage.run(ctx);
        } catch (err) {
            const message = errorMessage(err);
            if (stage.advisory) {
                logger.warn(`  ${message}`);
                await dispatch({ type: 'STAGE_WARNED', stageId: stage.id, message, timestamp: now() });
                continue;
            }

            await dispatch({
                type: 'STAGE_FAILED',
                stageId: stage.id,
                message,
                errorName: err instanceof Error ? err.name : 'Error',
                timestamp: now(),
            });
            return { state, error: err instanceof Error ? err : new Error(message) };
        }

        // Outside the try: a failing onTransition is not a stage failure
        if (summary) logger.success(`  ${summary}`);
        await dispatch({
            type: 'STAGE_SUCCEEDED',
            stageId: stage.id,
            summary: summary || undefined,
            timestamp: now(),
        });
    }

    return { state };
}
