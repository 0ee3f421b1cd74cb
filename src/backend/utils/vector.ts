import type { Vec3 } from '@backend/types'

export const vec3 = (x: number, y: number, z: number): Vec3 => ({ x, y, z })

export const add = (a: Vec3, b: Vec3): Vec3 => vec3(a.x + b.x, a.y + b.y, a.z + b.z)

export const subtract = (a: Vec3, b: Vec3): Vec3 => vec3(a.x - b.x, a.y - b.y, a.z - b.z)

export const scale = (v: Vec3, factor: number): Vec3 =>
  vec3(v.x * factor, v.y * factor, v.z * factor)

export const dot = (a: Vec3, b: Vec3): number => a.x * b.x + a.y * b.y + a.z * b.z

export const norm = (v: Vec3): number => Math.hypot(v.x, v.y, v.z)
