#!/usr/bin/env node
// src/main.ts - CPU raytracer entry point

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { RenderJob, type RenderOutcome } from './core/RenderJob';
import { HeadlessSurface } from './host/HeadlessSurface';
import { writePpm } from './host/ppm';
import { InlineExecutor } from './rendering/InlineExecutor';
import { ThreadedExecutor } from './rendering/ThreadedExecutor';
import { Scene } from './scene/Scene';
import { CLI_CONFIG, RENDER_CONFIG, type RenderConfig } from './utils/Constants';
import { LogLevel, Logger } from './utils/Logger';

export interface CliOptions {
    width: number;
    height: number;
    out: string;
    inline: boolean;
    verbose: boolean;
    traceRows: boolean;
    config: Partial<RenderConfig>;
}

export async function parseArgs(argv: string[]): Promise<CliOptions> {
    const args = await yargs(argv)
        .scriptName('raytrace')
        .usage('Render the default sphere scene into a PPM image')
        .options({
            width: { type: 'number', default: CLI_CONFIG.DEFAULT_WIDTH, describe: 'Image width in pixels' },
            height: { type: 'number', default: CLI_CONFIG.DEFAULT_HEIGHT, describe: 'Image height in pixels' },
            samples: { type: 'number', default: RENDER_CONFIG.SAMPLES_PER_PIXEL, describe: 'Samples per pixel' },
            depth: { type: 'number', default: RENDER_CONFIG.MAX_DEPTH, describe: 'Maximum diffuse bounces' },
            'update-rate': { type: 'number', default: RENDER_CONFIG.UPDATE_RATE, describe: 'Target batches per second per row' },
            'focal-length': { type: 'number', default: RENDER_CONFIG.FOCAL_LENGTH, describe: 'Camera focal length' },
            workers: { type: 'number', describe: 'Worker threads (default: cores - 1)' },
            inline: { type: 'boolean', default: false, describe: 'Render on the main thread' },
            out: { type: 'string', default: CLI_CONFIG.DEFAULT_OUTPUT, describe: 'Output PPM file' },
            verbose: { type: 'boolean', default: false, describe: 'Debug logging' },
            'trace-rows': { type: 'boolean', default: false, describe: 'Log every row flush (implies --verbose)' },
        })
        .example('$0 --width 640 --height 360 --samples 32', 'Render a larger, smoother frame')
        .strict()
        .help()
        .parseAsync();

    const config: Partial<RenderConfig> = {
        samplesPerPixel: args.samples,
        maxDepth: args.depth,
        updateRate: args['update-rate'],
        focalLength: args['focal-length'],
    };
    if (args.workers !== undefined) {
        config.workerCount = args.workers;
    }

    return {
        width: args.width,
        height: args.height,
        out: args.out,
        inline: args.inline,
        verbose: args.verbose,
        traceRows: args['trace-rows'],
        config,
    };
}

export function configureLogging(options: Pick<CliOptions, 'verbose' | 'traceRows'>): void {
    const logger = Logger.getInstance();
    logger.setLogLevel(options.verbose || options.traceRows ? LogLevel.DEBUG : LogLevel.INFO);
    logger.setShowRowDetails(options.traceRows);
}

export async function renderToFile(options: CliOptions): Promise<RenderOutcome | null> {
    const logger = Logger.getInstance();
    const surface = new HeadlessSurface(options.width, options.height);
    const executor = options.inline ? new InlineExecutor() : new ThreadedExecutor();

    // The redraw marks the finished frame; capture it then
    const redrawn: Uint8Array[] = [];
    surface.onRedraw(s => redrawn.push(s.frameBuffer.snapshot()));

    const job = RenderJob.start(Scene.defaultDescriptor(), surface, options.config, { executor });
    const outcome = await job.join();
    const finished = redrawn.at(-1);

    if (outcome?.kind === 'completed' && finished) {
        const { width, height } = surface.currentSize();
        await writePpm(options.out, width, height, finished);
        logger.success(`Wrote ${width}x${height} frame to ${options.out}`);
        job.getMonitor().logSummary();
    }

    return outcome;
}

async function main(): Promise<void> {
    const logger = Logger.getInstance();
    const options = await parseArgs(hideBin(process.argv));

    configureLogging(options);
    logger.init(`Rendering ${options.width}x${options.height} (${options.inline ? 'inline' : 'threaded'})`);

    const outcome = await renderToFile(options);
    if (outcome?.kind !== 'completed') {
        logger.warning(`Render did not complete: ${outcome?.kind ?? 'not started'}`);
        process.exitCode = 1;
    }
}

if (require.main === module) {
    main().catch(error => {
        Logger.getInstance().error('Fatal error:', error);
        process.exitCode = 1;
    });
}
