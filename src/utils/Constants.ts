import { availableParallelism } from 'os';
import { ConfigError } from '../core/errors';

export type Vec3Tuple = readonly [number, number, number];

/**
 * Everything a render job needs besides the scene and the surface size.
 * Fixed at job start; plain data so it can be posted to worker threads.
 */
export interface RenderConfig {
    /** Target frames per second; one batch per row should take about 1/updateRate. */
    updateRate: number;
    samplesPerPixel: number;
    /** Bounce budget of the shader. 0 renders black. */
    maxDepth: number;
    focalLength: number;
    origin: Vec3Tuple;
    workerCount: number;
}

export const RENDER_CONFIG = {
    UPDATE_RATE: 60,
    SAMPLES_PER_PIXEL: 8,
    MAX_DEPTH: 8,
    FOCAL_LENGTH: 1.0,
    ORIGIN: [0, 0, 0],
    get WORKER_COUNT() {
        // Leave one core for the host thread
        return Math.max(1, availableParallelism() - 1);
    },
} as const;

export const SCENE_CONFIG = {
    T_MIN: 0.001,               // Avoids self-intersection at the bounce origin
    DIFFUSE_REFLECTANCE: 0.5,
    SKY_HORIZON: [1.0, 1.0, 1.0, 1.0],
    SKY_ZENITH: [0.25, 0.49, 1.0, 1.0],
    DEFAULT_SPHERES: [
        { center: [0, -100.5, -1], radius: 100 },  // Ground
        { center: [0, 0, -1], radius: 0.5 },
    ],
} as const;

// Single-pixel probe used to seed the pixels-per-frame estimate
export const CALIBRATION_CONFIG = {
    UV: [0, 0],
    PIXEL_SIZE: [1, 1],
    VIEWPORT: [2, 2],
} as const;

export const FRAME_CONFIG = {
    BYTES_PER_PIXEL: 4,
    // Header words of the shared frame buffer
    LOCK_INDEX: 0,
    BYTE_LENGTH_INDEX: 1,
    REVISION_INDEX: 2,
    HEADER_WORDS: 3,
    UNLOCKED: 0,
    LOCKED: 1,
} as const;

export const CLI_CONFIG = {
    DEFAULT_WIDTH: 320,
    DEFAULT_HEIGHT: 180,
    DEFAULT_OUTPUT: 'frame.ppm',
} as const;

// Helpers

export function defaultRenderConfig(): RenderConfig {
    return {
        updateRate: RENDER_CONFIG.UPDATE_RATE,
        samplesPerPixel: RENDER_CONFIG.SAMPLES_PER_PIXEL,
        maxDepth: RENDER_CONFIG.MAX_DEPTH,
        focalLength: RENDER_CONFIG.FOCAL_LENGTH,
        origin: RENDER_CONFIG.ORIGIN,
        workerCount: RENDER_CONFIG.WORKER_COUNT,
    };
}

/**
 * Merges overrides into the defaults and rejects values the render loop
 * cannot work with.
 */
export function resolveRenderConfig(overrides: Partial<RenderConfig> = {}): RenderConfig {
    const config: RenderConfig = { ...defaultRenderConfig(), ...overrides };

    if (!Number.isFinite(config.updateRate) || config.updateRate <= 0) {
        throw new ConfigError(`updateRate must be a positive number, got ${config.updateRate}`);
    }
    if (!Number.isInteger(config.samplesPerPixel) || config.samplesPerPixel < 1) {
        throw new ConfigError(`samplesPerPixel must be an integer >= 1, got ${config.samplesPerPixel}`);
    }
    if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
        throw new ConfigError(`maxDepth must be an integer >= 0, got ${config.maxDepth}`);
    }
    if (!Number.isFinite(config.focalLength) || config.focalLength <= 0) {
        throw new ConfigError(`focalLength must be a positive number, got ${config.focalLength}`);
    }
    if (config.origin.length !== 3 || !config.origin.every(Number.isFinite)) {
        throw new ConfigError(`origin must be three finite numbers, got [${config.origin.join(', ')}]`);
    }
    if (!Number.isInteger(config.workerCount) || config.workerCount < 1) {
        throw new ConfigError(`workerCount must be an integer >= 1, got ${config.workerCount}`);
    }

    return config;
}

export function targetIntervalMs(config: RenderConfig): number {
    return 1000 / config.updateRate;
}

export function calculateFrameByteLength(width: number, height: number): number {
    return width * height * FRAME_CONFIG.BYTES_PER_PIXEL;
}
