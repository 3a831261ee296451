import fs from 'fs-extra';
import path from 'path';

const STATE_FILE = 'bootstrap-state.json';

export type PipelineStatus = 'idle' | 'running' | 'completed' | 'failed';

export type StageStatus = 'pending' | 'running' | 'succeeded' | 'skipped' | 'warned' | 'failed';

export interface StageRecord {
    id: string;
    label: string;
    status: StageStatus;
    /** Summary line, skip reason, or error message depending on status. */
    detail?: string;
    startedAt?: number;
    finishedAt?: number;
}

export interface StageFailure {
    stageId: string;
    label: string;
    position: number;
    message: string;
    errorName: string;
}

export interface PipelineState {
    status: PipelineStatus;
    stages: StageRecord[];
    /** Index into `stages` of the running or last attempted stage; -1 before start. */
    cursor: number;
    failure: StageFailure | null;
    createdAt: number;
    updatedAt: number;
}

export function createInitialState(stages: Array<{ id: string; label: string }>, now: number = Date.now()): PipelineState {
    return {
        status: 'idle',
        stages: stages.map(s => ({ id: s.id, label: s.label, status: 'pending' })),
        cursor: -1,
        failure: null,
        createdAt: now,
        updatedAt: now,
    };
}

/**
 * Persists the last run's state next to the outputs, so an operator can see
 * which stage stopped the run without scrolling back through the log.
 */
export class StateManager {
    private statePath: string;

    constructor(outputDir: string) {
        this.statePath = path.join(outputDir, STATE_FILE);
    }

    get path(): string {
        return this.statePath;
    }

    async load(): Promise<PipelineState | null> {
        if (!await fs.pathExists(this.statePath)) {
            return null;
        }

        try {
            const content: PipelineState = await fs.readJson(this.statePath);
            return content;
        } catch (error) {
            throw new Error(`Failed to load state: ${error}`);
        }
    }

    async save(state: PipelineState): Promise<void> {
        await fs.ensureDir(path.dirname(this.statePath));
        const tmpPath = this.statePath + '.tmp';
        await fs.writeJson(tmpPath, state, { spaces: 2 });
        await fs.move(tmpPath, this.statePath, { overwrite: true });
    }
}
