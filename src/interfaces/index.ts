/**
 * Host Capability Interfaces
 *
 * The mapper reads geometry and stores properties only through these,
 * so it carries no dependency on a particular host.
 */

/**
 * Bounding box extents, in scene units
 */
export interface BoundingBox {
  x: number;
  y: number;
  z: number;
}

/**
 * Technical metrics for one object or a whole scene
 */
export interface GeometryMetrics {
  triCount: number;
  vertexCount: number;
  boundingBox: BoundingBox;
  materialCount: number;
  hasTextures: boolean;
  supportsPbr: boolean;
}

/**
 * Per-node stats block written under `metro_object_stats`
 */
export interface ObjectStats {
  triCount: number;
  vertexCount: number;
  boundingBox: BoundingBox;
}

/**
 * Geometry Metrics Provider
 *
 * Supplies metrics already computed by the host. `TObject` is the host's
 * handle for a mesh object.
 */
export interface GeometryMetricsProvider<TObject = unknown> {
  /** Name of the scene the metrics describe */
  getSceneName(): string;
  /** Visible mesh objects in the scene */
  listMeshObjects(): TObject[];
  /** Aggregate over every visible mesh object */
  getSceneMetrics(): GeometryMetrics;
  /** Metrics for one object, or null when it is not a mesh */
  getObjectMetrics(object: TObject): GeometryMetrics | null;
}

/**
 * Values a host property store may hold natively
 */
export type StoredValue =
  | string
  | number
  | boolean
  | string[]
  | number[]
  | boolean[]
  | { [key: string]: StoredValue };

/**
 * Field Store
 *
 * Host-native attached-property storage (scene or object custom properties).
 */
export interface FieldStore {
  get(key: string): unknown;
  set(key: string, value: StoredValue): void;
  has(key: string): boolean;
  delete(key: string): void;
  keys(): string[];
}
