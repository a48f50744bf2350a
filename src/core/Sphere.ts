import * as THREE from 'three';
import type { Ray } from './Ray';

export type Face = 'front' | 'back';

export interface HitReport {
    t: number;
    at: THREE.Vector3;
    /** Unit length, always facing the incoming ray. */
    normal: THREE.Vector3;
    face: Face;
}

export class Sphere {
    readonly center: THREE.Vector3;
    readonly radius: number;

    constructor(center: THREE.Vector3, radius: number) {
        if (!(radius > 0)) {
            throw new RangeError(`Sphere radius must be positive, got ${radius}`);
        }
        this.center = center;
        this.radius = radius;
    }

    /**
     * Intersects the ray with the sphere over [tMin, tMax).
     *
     * Only the near root is considered. A ray starting inside the sphere has
     * its near root behind it and therefore misses.
     */
    hit(ray: Ray, tMin: number, tMax: number): HitReport | null {
        const oc = ray.origin.clone().sub(this.center);
        const a = ray.direction.lengthSq();
        const b = oc.dot(ray.direction);
        const c = oc.lengthSq() - this.radius * this.radius;
        const discriminant = b * b - a * c;

        if (discriminant < 0) {
            return null;
        }

        const t = (-b - Math.sqrt(discriminant)) / a;
        if (!(t >= tMin && t < tMax)) {
            return null;
        }

        const at = ray.at(t);
        const normal = at.clone().sub(this.center).divideScalar(this.radius);
        let face: Face = 'front';

        if (normal.dot(ray.direction) > 0) {
            normal.negate();
            face = 'back';
        }

        return { t, at, normal, face };
    }
}
