import * as THREE from 'three';
import type { PinholeCamera } from '../core/Camera';
import type { RandomSource } from '../core/random';
import type { Scene } from '../scene/Scene';

export type Rgba8 = [number, number, number, number];

export interface PixelSamplerContext {
    scene: Scene;
    camera: PinholeCamera;
    samplesPerPixel: number;
    maxDepth: number;
}

const ZERO = new THREE.Vector4(0, 0, 0, 0);
const ONE = new THREE.Vector4(1, 1, 1, 1);

/**
 * Anti-aliased color of one pixel.
 *
 * Every sample is jittered uniformly inside the pixel footprint and clamped
 * to [0, 1] before averaging, so HDR outliers cannot dominate the mean.
 */
export function sampleColor(
    context: PixelSamplerContext,
    rng: RandomSource,
    uv: THREE.Vector2,
    pixelSize: THREE.Vector2,
    viewport: THREE.Vector2
): Rgba8 {
    const { scene, camera, samplesPerPixel, maxDepth } = context;
    const sum = new THREE.Vector4();
    const jittered = new THREE.Vector2();

    for (let i = 0; i < samplesPerPixel; i++) {
        jittered.set(rng(), rng()).multiply(pixelSize).add(uv);
        const ray = camera.getRay(jittered, viewport);
        sum.add(scene.color(rng, ray, maxDepth).clamp(ZERO, ONE));
    }

    return linearToSrgbBytes(sum.divideScalar(samplesPerPixel));
}

/**
 * sRGB transfer function, scaled by 256 and saturated to a byte.
 */
export function linearToSrgb(c: number): number {
    const s = c <= 0.0031308
        ? 12.92 * c
        : 1.055 * Math.pow(c, 1 / 2.4) - 0.055;
    return Math.trunc(Math.min(Math.max(s * 256, 0), 255));
}

export function linearToSrgbBytes(color: THREE.Vector4): Rgba8 {
    return [
        linearToSrgb(color.x),
        linearToSrgb(color.y),
        linearToSrgb(color.z),
        linearToSrgb(color.w),
    ];
}
