import * as THREE from 'three';

/**
 * Uniform source in [0, 1). Every row task owns one; the default draws from
 * the thread's own entropy-seeded `Math.random`.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Uniformly distributed point on the unit sphere surface.
 */
export function randomUnitVector(rng: RandomSource, target: THREE.Vector3 = new THREE.Vector3()): THREE.Vector3 {
    const theta = rng() * Math.PI * 2;
    const u = rng() * 2 - 1;
    const c = Math.sqrt(1 - u * u);
    return target.set(c * Math.cos(theta), u, c * Math.sin(theta));
}
