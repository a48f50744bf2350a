import type { CancellationToken } from '../core/CancellationToken';
import type { SceneDescriptor } from '../scene/Scene';
import type { RenderConfig } from '../utils/Constants';
import type { SharedFrameBuffer } from './FrameBuffer';
import type { BatchStats, RowAbort } from './RowScheduler';

/**
 * One render, fully described in plain data. Bound to the surface size and
 * frame revision observed when the job started.
 */
export interface RenderPlan {
    scene: SceneDescriptor;
    width: number;
    height: number;
    config: RenderConfig;
    /** Calibrated starting batch size for every row. */
    pixelsPerFrame: number;
    revision: number;
}

export interface RowRunResult {
    outcome: 'completed' | RowAbort;
    stats: BatchStats;
}

/**
 * Drives one `RowTask` per image row over a pool of lanes. Resolves once
 * every lane has stopped; rejects on an unexpected failure.
 */
export interface RowExecutor {
    readonly name: string;
    run(plan: RenderPlan, frame: SharedFrameBuffer, token: CancellationToken): Promise<RowRunResult>;
}
