import * as THREE from 'three';
import type { LatticeView } from './types';

export interface SurfaceGeometryOptions {
  verticalExaggeration?: number;
  /** Half-width of the on-grade band (m). */
  toleranceM?: number;
}

const ON_GRADE = new THREE.Color(0.3, 0.7, 0.3);

/**
 * Indexed geometry of the lattice: one vertex per bin, centred on the bin
 * centroid, z from the live surface, coloured by what remains to move.
 */
export function buildSurfaceGeometry(
  lattice: LatticeView,
  options: SurfaceGeometryOptions = {}
): THREE.BufferGeometry {
  const n = lattice.bins.length;
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(new Float32Array(n * 3), 3));
  geometry.setAttribute('color', new THREE.BufferAttribute(new Float32Array(n * 3), 3));

  const indices = new Uint32Array(lattice.faces.length * 3);
  lattice.faces.forEach(([a, b, c], i) => {
    indices[i * 3] = a;
    indices[i * 3 + 1] = b;
    indices[i * 3 + 2] = c;
  });
  geometry.setIndex(new THREE.BufferAttribute(indices, 1));

  updateSurfaceGeometry(geometry, lattice, options);
  return geometry;
}

/** Refreshes positions, colours and normals after trips have been applied. */
export function updateSurfaceGeometry(
  geometry: THREE.BufferGeometry,
  lattice: LatticeView,
  options: SurfaceGeometryOptions = {}
): void {
  const ve = options.verticalExaggeration ?? 1;
  const tolerance = options.toleranceM ?? 0.01;
  const positions = geometry.getAttribute('position');
  const colors = geometry.getAttribute('color');

  let cx = 0, cy = 0;
  for (const bin of lattice.bins) {
    cx += bin.x;
    cy += bin.y;
  }
  const n = Math.max(lattice.bins.length, 1);
  cx /= n;
  cy /= n;

  let maxAbsDz = 0;
  for (const bin of lattice.bins) {
    maxAbsDz = Math.max(maxAbsDz, Math.abs(bin.zProp - bin.zCur));
  }
  if (maxAbsDz < tolerance) maxAbsDz = 1;

  lattice.bins.forEach((bin, i) => {
    positions.setXYZ(i, bin.x - cx, bin.y - cy, bin.zCur * ve);

    const dz = bin.zProp - bin.zCur;
    const t = Math.min(Math.abs(dz) / maxAbsDz, 1);
    if (dz < -tolerance) {
      // Cut remaining: red
      colors.setXYZ(i, 0.4 + 0.6 * t, 0.4 * (1 - t), 0.4 * (1 - t));
    } else if (dz > tolerance) {
      // Fill remaining: blue
      colors.setXYZ(i, 0.4 * (1 - t), 0.4 * (1 - t), 0.4 + 0.6 * t);
    } else {
      colors.setXYZ(i, ON_GRADE.r, ON_GRADE.g, ON_GRADE.b);
    }
  });

  positions.needsUpdate = true;
  colors.needsUpdate = true;
  geometry.computeVertexNormals();
  geometry.computeBoundingBox();
}
