import * as THREE from 'three';
import { Ray } from '../core/Ray';
import { Sphere, type HitReport } from '../core/Sphere';
import { randomUnitVector, type RandomSource } from '../core/random';
import { SCENE_CONFIG, type Vec3Tuple } from '../utils/Constants';

export interface SphereDescriptor {
    center: Vec3Tuple;
    radius: number;
}

/**
 * Plain-data form of a scene, safe to post to worker threads.
 */
export interface SceneDescriptor {
    spheres: readonly SphereDescriptor[];
}

/**
 * Scene - static list of spheres plus the diffuse shading model
 */
export class Scene {
    private readonly spheres: readonly Sphere[];

    constructor(spheres: readonly Sphere[]) {
        this.spheres = spheres;
    }

    public static fromDescriptor(descriptor: SceneDescriptor): Scene {
        return new Scene(descriptor.spheres.map(s =>
            new Sphere(new THREE.Vector3(...s.center), s.radius)
        ));
    }

    /**
     * Ground sphere plus one small sphere straight ahead of the camera.
     */
    public static defaultDescriptor(): SceneDescriptor {
        return {
            spheres: SCENE_CONFIG.DEFAULT_SPHERES.map(s => ({ center: s.center, radius: s.radius })),
        };
    }

    public static default(): Scene {
        return Scene.fromDescriptor(Scene.defaultDescriptor());
    }

    public getSphereCount(): number {
        return this.spheres.length;
    }

    public getSpheres(): readonly Sphere[] {
        return this.spheres;
    }

    // ===== INTERSECTION =====

    /**
     * Closest hit over [tMin, tMax). The upper bound shrinks to every accepted
     * hit, so later spheres only win when they are strictly nearer.
     */
    public nearestHit(ray: Ray, tMin: number, tMax: number): HitReport | null {
        let closest: HitReport | null = null;
        let bound = tMax;

        for (const sphere of this.spheres) {
            const hit = sphere.hit(ray, tMin, bound);
            if (hit) {
                closest = hit;
                bound = hit.t;
            }
        }

        return closest;
    }

    // ===== SHADING =====

    /**
     * Monte-Carlo estimate of the light arriving along `ray`, following at most
     * `depth` diffuse bounces. Each bounce halves RGB; alpha stays 1.
     */
    public color(rng: RandomSource, ray: Ray, depth: number): THREE.Vector4 {
        let attenuation = 1;
        let current = ray;

        for (let remaining = depth; remaining > 0; remaining--) {
            const hit = this.nearestHit(current, SCENE_CONFIG.T_MIN, Infinity);

            if (!hit) {
                const sky = this.background(current.direction);
                return sky.set(sky.x * attenuation, sky.y * attenuation, sky.z * attenuation, 1);
            }

            const direction = randomUnitVector(rng).add(hit.normal);
            current = new Ray(hit.at, direction);
            attenuation *= SCENE_CONFIG.DIFFUSE_REFLECTANCE;
        }

        // Bounce budget exhausted
        return new THREE.Vector4(0, 0, 0, 1);
    }

    /**
     * Vertical gradient from white at the nadir to sky blue at the zenith.
     */
    public background(direction: THREE.Vector3): THREE.Vector4 {
        const t = 0.5 * (direction.clone().normalize().y + 1);
        return new THREE.Vector4(...SCENE_CONFIG.SKY_HORIZON)
            .lerp(new THREE.Vector4(...SCENE_CONFIG.SKY_ZENITH), t);
    }
}
