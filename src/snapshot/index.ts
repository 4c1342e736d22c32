// src/snapshot/index.ts

export {
  Snapshot,
  toSnapshotObject,
  toSnapshotValue,
  type SnapshotJson,
  type SnapshotMetadata,
  type SnapshotMetadataInput,
} from "./snapshot";
export {
  getValueAtPath,
  isPlainObject,
  setField,
  type SnapshotObject,
  type SnapshotScalar,
  type SnapshotValue,
} from "./values";
