import { setImmediate as yieldToHost } from 'timers/promises';
import { CancellationSource, type CancellationToken } from './CancellationToken';
import { JobFailureError } from './errors';
import { defaultRandom } from './random';
import type { RenderSurface } from '../host/RenderSurface';
import type { RenderPlan, RowExecutor } from '../rendering/RowExecutor';
import { calibratePixelsPerFrame, createSamplerContext } from '../rendering/RowScheduler';
import { ThreadedExecutor } from '../rendering/ThreadedExecutor';
import { Scene, type SceneDescriptor } from '../scene/Scene';
import { Logger } from '../utils/Logger';
import { PerformanceMonitor } from '../utils/PerformanceMonitor';
import { resolveRenderConfig, targetIntervalMs, type RenderConfig } from '../utils/Constants';

export type RenderOutcome =
    | { kind: 'completed'; elapsedMs: number }
    | { kind: 'cancelled' }
    | { kind: 'resized' };

export interface RenderJobOptions {
    /** Defaults to worker threads. */
    executor?: RowExecutor;
    monitor?: PerformanceMonitor;
}

interface ActiveRun {
    source: CancellationSource;
    /** Resolves to null on failure; never rejects. */
    finished: Promise<RenderOutcome | null>;
    settled: boolean;
    failure: JobFailureError | null;
}

/**
 * 🎬 RenderJob - Handle to a background render
 *
 * At most one render is active per handle. Cancellation is cooperative: the
 * row tasks check the token before every flush, so a cancelled render stops
 * within one batch. Failures of the background render are kept and thrown by
 * the next lifecycle call.
 */
export class RenderJob {
    private current: ActiveRun | null = null;
    private lifecycle: Promise<void> = Promise.resolve();
    private readonly executor: RowExecutor;
    private readonly monitor: PerformanceMonitor;
    private logger: Logger;

    private constructor(options: RenderJobOptions) {
        this.executor = options.executor ?? new ThreadedExecutor();
        this.monitor = options.monitor ?? new PerformanceMonitor();
        this.logger = Logger.getInstance();
    }

    /**
     * Starts rendering `scene` into `surface` in the background. Throws
     * `ConfigError` synchronously for an invalid configuration.
     */
    public static start(
        scene: SceneDescriptor,
        surface: RenderSurface,
        config: Partial<RenderConfig> = {},
        options: RenderJobOptions = {}
    ): RenderJob {
        const job = new RenderJob(options);
        job.current = job.spawn(scene, surface, resolveRenderConfig(config));
        return job;
    }

    public getMonitor(): PerformanceMonitor {
        return this.monitor;
    }

    // ===== LIFECYCLE =====

    /**
     * Whether the background render is still active. A finished render is
     * released here; if it failed, its `JobFailureError` is thrown once.
     */
    public isRunning(): boolean {
        const run = this.current;
        if (!run) {
            return false;
        }
        if (!run.settled) {
            return true;
        }

        this.current = null;
        if (run.failure) {
            throw run.failure;
        }
        return false;
    }

    /**
     * Cancels the active render and waits until it has exited. Resolves to its
     * outcome, or null when nothing was running.
     */
    public async cancelAndJoin(): Promise<RenderOutcome | null> {
        const run = this.current;
        if (!run) {
            return null;
        }

        this.logger.job('Stopping render');
        run.source.cancel();
        return this.settle(run);
    }

    /**
     * Cancels and joins the active render, then starts a new one. Restarts
     * are queued behind each other, so quick successive calls never overlap
     * two renders.
     */
    public restart(
        scene: SceneDescriptor,
        surface: RenderSurface,
        config: Partial<RenderConfig> = {}
    ): Promise<void> {
        const resolved = resolveRenderConfig(config);
        const next = this.lifecycle.then(async () => {
            await this.cancelAndJoin();
            this.current = this.spawn(scene, surface, resolved);
        });
        // The caller observes failures through `next`; the queue keeps going
        this.lifecycle = next.then(() => undefined, () => undefined);
        return next;
    }

    /**
     * Waits for the active render to end on its own, after any queued restart.
     */
    public async join(): Promise<RenderOutcome | null> {
        await this.lifecycle;
        const run = this.current;
        if (!run) {
            return null;
        }
        return this.settle(run);
    }

    private async settle(run: ActiveRun): Promise<RenderOutcome | null> {
        const outcome = await run.finished;
        if (this.current === run) {
            this.current = null;
        }
        if (run.failure) {
            throw run.failure;
        }
        return outcome;
    }

    // ===== BACKGROUND RENDER =====

    private spawn(scene: SceneDescriptor, surface: RenderSurface, config: RenderConfig): ActiveRun {
        const source = new CancellationSource();
        const run: ActiveRun = {
            source,
            finished: Promise.resolve(null),
            settled: false,
            failure: null,
        };

        run.finished = this.render(scene, surface, config, source.token).then(
            outcome => {
                run.settled = true;
                return outcome;
            },
            (error: unknown) => {
                run.settled = true;
                run.failure = JobFailureError.wrap(error);
                this.logger.error(run.failure.message, error);
                return null;
            }
        );

        return run;
    }

    private async render(
        scene: SceneDescriptor,
        surface: RenderSurface,
        config: RenderConfig,
        token: CancellationToken
    ): Promise<RenderOutcome> {
        const begin = performance.now();
        const { width, height } = surface.currentSize();
        const revision = surface.frameBuffer.getRevision();

        this.logger.job(`Starting a ${this.executor.name} render for surface size ${width}x${height}`);

        // Size and revision are bound above; everything after runs off the caller's stack
        await yieldToHost();

        const targetMs = targetIntervalMs(config);
        const pixelsPerFrame = calibratePixelsPerFrame(
            createSamplerContext(Scene.fromDescriptor(scene), config),
            targetMs,
            defaultRandom
        );
        this.logger.debug(`Calibrated to ${pixelsPerFrame} pixels per ${targetMs.toFixed(1)}ms frame`);

        const plan: RenderPlan = { scene, width, height, config, pixelsPerFrame, revision };
        const result = await this.executor.run(plan, surface.frameBuffer, token);
        this.monitor.recordBatchStats(result.stats);

        switch (result.outcome) {
            case 'completed': {
                const elapsedMs = performance.now() - begin;
                this.logger.success(`Render finished in ${elapsedMs.toFixed(1)}ms`);
                this.monitor.recordFrameTime(elapsedMs);
                surface.requestRedraw();
                return { kind: 'completed', elapsedMs };
            }
            case 'cancelled':
                this.logger.job('Render cancelled');
                return { kind: 'cancelled' };
            case 'resized':
                this.logger.warning('Render detected a resize, cancelling render');
                return { kind: 'resized' };
        }
    }
}
