import { SharedFrameBuffer } from '../rendering/FrameBuffer';
import { Logger } from '../utils/Logger';
import type { RenderSurface, SurfaceSize } from './RenderSurface';

export type RedrawListener = (surface: HeadlessSurface) => void;

/**
 * Off-screen surface: a frame buffer plus a redraw counter. Used by the CLI
 * and by tests in place of a window.
 */
export class HeadlessSurface implements RenderSurface {
    readonly frameBuffer: SharedFrameBuffer;
    private redrawCount: number = 0;
    private listeners: RedrawListener[] = [];
    private logger: Logger;

    constructor(width: number, height: number) {
        this.frameBuffer = SharedFrameBuffer.create(width, height);
        this.logger = Logger.getInstance();
    }

    public currentSize(): SurfaceSize {
        return this.frameBuffer.getDimensions();
    }

    public requestRedraw(): void {
        this.redrawCount++;
        this.logger.debug(`Redraw requested (#${this.redrawCount})`);
        for (const listener of this.listeners) {
            listener(this);
        }
    }

    public onRedraw(listener: RedrawListener): void {
        this.listeners.push(listener);
    }

    public getRedrawCount(): number {
        return this.redrawCount;
    }

    /**
     * Simulates the window being resized: the old pixels are discarded.
     */
    public resize(width: number, height: number): void {
        this.logger.info(`Surface resized to ${width}x${height}`);
        this.frameBuffer.resize(width, height);
    }
}
