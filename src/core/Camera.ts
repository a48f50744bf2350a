import * as THREE from 'three';
import { Ray } from './Ray';
import type { RenderConfig } from '../utils/Constants';

/**
 * Pinhole camera looking down -Z.
 *
 * Screen coordinates are normalized: u from left (0) to right (1),
 * v from bottom (0) to top (1).
 */
export class PinholeCamera {
    readonly origin: THREE.Vector3;
    readonly focalLength: number;

    constructor(origin: THREE.Vector3, focalLength: number) {
        this.origin = origin;
        this.focalLength = focalLength;
    }

    public static fromConfig(config: Pick<RenderConfig, 'origin' | 'focalLength'>): PinholeCamera {
        return new PinholeCamera(new THREE.Vector3(...config.origin), config.focalLength);
    }

    /**
     * Ray through `uv` on an image plane of `viewport` world units, centered on
     * the view axis at `focalLength` in front of the origin.
     */
    getRay(uv: THREE.Vector2, viewport: THREE.Vector2): Ray {
        const plane = uv.clone().subScalar(0.5).multiply(viewport);
        // Direction is offset by the origin as well; a no-op for the default origin
        const direction = new THREE.Vector3(plane.x, plane.y, -this.focalLength).add(this.origin);
        return new Ray(this.origin.clone(), direction);
    }
}

/**
 * Image-plane extent for a surface: two units tall, width following the
 * aspect ratio.
 */
export function viewportForSize(width: number, height: number): THREE.Vector2 {
    return new THREE.Vector2(2 * width / height, 2);
}

export function pixelSizeForSize(width: number, height: number): THREE.Vector2 {
    return new THREE.Vector2(1 / width, 1 / height);
}
