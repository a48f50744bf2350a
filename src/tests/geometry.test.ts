/**
 * Ray/sphere intersection and nearest-hit search.
 *
 * Run with: npx tsx --test src/tests/geometry.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as THREE from 'three';
import { Ray } from '../core/Ray';
import { Sphere } from '../core/Sphere';
import { Scene } from '../scene/Scene';
import { assertClose, seededRandom } from './helpers';

const T_MIN = 0.001;

function randomPoint(rng: () => number, extent: number): THREE.Vector3 {
    return new THREE.Vector3(
        (rng() - 0.5) * 2 * extent,
        (rng() - 0.5) * 2 * extent,
        (rng() - 0.5) * 2 * extent
    );
}

describe('Ray', () => {
    it('evaluates origin + t * direction', () => {
        const ray = new Ray(new THREE.Vector3(1, 2, 3), new THREE.Vector3(0, 2, -1));
        assert.deepEqual(ray.at(1.5).toArray(), [1, 5, 1.5]);
    });

    it('does not mutate its direction', () => {
        const ray = new Ray(new THREE.Vector3(), new THREE.Vector3(0, 0, -2));
        ray.at(3);
        assert.deepEqual(ray.direction.toArray(), [0, 0, -2]);
    });
});

describe('Sphere.hit', () => {
    const sphere = new Sphere(new THREE.Vector3(0, 0, -1), 0.5);

    it('reports the near intersection with an outward normal', () => {
        const ray = new Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, -1));
        const hit = sphere.hit(ray, T_MIN, Infinity);

        assert.ok(hit);
        assert.equal(hit.t, 0.5);
        assert.deepEqual(hit.at.toArray(), [0, 0, -0.5]);
        assert.deepEqual(hit.normal.toArray(), [0, 0, 1]);
        assert.equal(hit.face, 'front');
    });

    it('accepts unnormalized directions', () => {
        const ray = new Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, -4));
        const hit = sphere.hit(ray, T_MIN, Infinity);

        assert.ok(hit);
        assert.equal(hit.t, 0.125);
        assert.deepEqual(hit.at.toArray(), [0, 0, -0.5]);
    });

    it('misses when the discriminant is negative', () => {
        const ray = new Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 1, 0));
        assert.equal(sphere.hit(ray, T_MIN, Infinity), null);
    });

    it('treats the upper bound as exclusive', () => {
        const ray = new Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, -1));
        assert.equal(sphere.hit(ray, T_MIN, 0.5), null);
        assert.ok(sphere.hit(ray, T_MIN, 0.5000001));
    });

    it('misses from inside because only the near root is tested', () => {
        const ray = new Ray(new THREE.Vector3(0, 0, -1), new THREE.Vector3(0, 0, -1));
        assert.equal(sphere.hit(ray, T_MIN, Infinity), null);
    });

    it('never hits when the ray starts outside and points away', () => {
        const rng = seededRandom(7);
        for (let i = 0; i < 500; i++) {
            const center = randomPoint(rng, 10);
            const radius = 0.1 + rng() * 3;
            const target = new Sphere(center, radius);

            const offset = randomPoint(rng, 1).normalize().multiplyScalar(radius * (1.01 + rng() * 5));
            const origin = center.clone().add(offset);
            // Any direction with a non-negative component along the offset points away
            const direction = randomPoint(rng, 1);
            if (direction.dot(offset) < 0) {
                direction.negate();
            }

            assert.equal(target.hit(new Ray(origin, direction), T_MIN, Infinity), null);
        }
    });

    it('always returns a normal facing the incoming ray', () => {
        const rng = seededRandom(11);
        let hits = 0;
        for (let i = 0; i < 500; i++) {
            const center = randomPoint(rng, 5);
            const target = new Sphere(center, 0.5 + rng() * 2);
            const origin = randomPoint(rng, 20);
            const aim = center.clone().add(randomPoint(rng, 1)).sub(origin);

            const hit = target.hit(new Ray(origin, aim), T_MIN, Infinity);
            if (hit) {
                hits++;
                assert.ok(hit.normal.dot(aim) <= 0);
                assertClose(hit.normal.length(), 1, 1e-9);
            }
        }
        assert.ok(hits > 0);
    });

    it('rejects a non-positive radius', () => {
        assert.throws(() => new Sphere(new THREE.Vector3(), 0), RangeError);
    });
});

describe('Scene.nearestHit', () => {
    const forward = new Ray(new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 0, -1));

    it('returns the closer of two spheres regardless of order', () => {
        const near = new Sphere(new THREE.Vector3(0, 0, -3), 1);
        const far = new Sphere(new THREE.Vector3(0, 0, -6), 1);

        assert.equal(new Scene([far, near]).nearestHit(forward, T_MIN, Infinity)?.t, 2);
        assert.equal(new Scene([near, far]).nearestHit(forward, T_MIN, Infinity)?.t, 2);
    });

    it('picks the nearest surface among overlapping spheres', () => {
        const a = new Sphere(new THREE.Vector3(0, 0, -3), 1);
        const b = new Sphere(new THREE.Vector3(0, 0, -3.5), 1);
        const hit = new Scene([b, a]).nearestHit(forward, T_MIN, Infinity);

        assert.ok(hit);
        assert.equal(hit.t, 2);
        assert.deepEqual(hit.at.toArray(), [0, 0, -2]);
    });

    it('matches the minimum over individual spheres', () => {
        const rng = seededRandom(23);
        for (let i = 0; i < 200; i++) {
            const spheres = Array.from({ length: 4 }, () =>
                new Sphere(randomPoint(rng, 3).add(new THREE.Vector3(0, 0, -6)), 0.5 + rng() * 2)
            );
            const ray = new Ray(new THREE.Vector3(0, 0, 0), randomPoint(rng, 0.5).add(new THREE.Vector3(0, 0, -1)));

            const candidates = spheres
                .map(s => s.hit(ray, T_MIN, Infinity)?.t)
                .filter((t): t is number => t !== undefined);
            const hit = new Scene(spheres).nearestHit(ray, T_MIN, Infinity);

            if (candidates.length === 0) {
                assert.equal(hit, null);
            } else {
                assert.equal(hit?.t, Math.min(...candidates));
            }
        }
    });

    it('misses in an empty scene', () => {
        assert.equal(new Scene([]).nearestHit(forward, T_MIN, Infinity), null);
    });
});
