import * as THREE from 'three';
import type { Sphere } from '../sim/sphere';
import { APP_CONFIG } from '../config/appConfig';

export type SphereMesh = THREE.Mesh<THREE.SphereGeometry, THREE.MeshStandardMaterial>;
export type WaterMesh = THREE.Mesh<THREE.PlaneGeometry, THREE.MeshStandardMaterial>;

/** Mesh for the floating sphere, sized to the sim radius and placed at its height. */
export function createSphereMesh(sphere: Sphere): SphereMesh {
  const segments = APP_CONFIG.SPHERE_SEGMENTS;
  const mesh = new THREE.Mesh(
    new THREE.SphereGeometry(sphere.radius, segments, segments / 2),
    new THREE.MeshStandardMaterial({ color: 0xffb347, roughness: 0.5, metalness: 0.1 })
  );
  mesh.name = 'sphere';
  mesh.position.set(0, sphere.height, 0);
  return mesh;
}

/** Horizontal water plane at height 0. */
export function createWaterSurface(size: number = APP_CONFIG.WATER_PLANE_SIZE): WaterMesh {
  const mesh = new THREE.Mesh(
    new THREE.PlaneGeometry(size, size),
    new THREE.MeshStandardMaterial({ color: 0x1e6fd9, transparent: true, opacity: 0.6, roughness: 0.2 })
  );
  mesh.name = 'water';
  // PlaneGeometry faces +Z; lay it flat.
  mesh.rotation.x = -Math.PI * 0.5;
  return mesh;
}

export type SphereScene = {
  scene: THREE.Scene;
  sphereMesh: SphereMesh;
  waterMesh: WaterMesh;
};

export function createSphereScene(sphere: Sphere): SphereScene {
  const scene = new THREE.Scene();
  const sphereMesh = createSphereMesh(sphere);
  const waterMesh = createWaterSurface();
  scene.add(sphereMesh, waterMesh);
  return { scene, sphereMesh, waterMesh };
}

/** Sync the mesh's vertical position to the sim height. */
export function syncSphereVisual(mesh: THREE.Object3D, sphere: Sphere): void {
  mesh.position.y = sphere.height;
}
