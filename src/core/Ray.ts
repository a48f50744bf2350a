import * as THREE from 'three';

export class Ray {
    readonly origin: THREE.Vector3;
    /** Not required to be unit length. */
    readonly direction: THREE.Vector3;

    constructor(origin: THREE.Vector3, direction: THREE.Vector3) {
        this.origin = origin;
        this.direction = direction;
    }

    /**
     * Point on the ray at parameter t: p(t) = origin + t * direction
     */
    at(t: number): THREE.Vector3 {
        return this.direction.clone().multiplyScalar(t).add(this.origin);
    }
}
