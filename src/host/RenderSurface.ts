import type { SharedFrameBuffer } from '../rendering/FrameBuffer';

export interface SurfaceSize {
    width: number;
    height: number;
}

/**
 * What a render job needs from the host that displays its output.
 */
export interface RenderSurface {
    /** Queried once when a job starts; the job stays bound to this size. */
    currentSize(): SurfaceSize;
    /** Called once, only after a render completed successfully. */
    requestRedraw(): void;
    readonly frameBuffer: SharedFrameBuffer;
}
