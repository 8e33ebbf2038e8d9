// Node.js-specific exports
// Re-exports everything from core plus the file-system backed dataset store

export * from "../core";

// Dataset store
export { Dataset, installDatasetMetadataAccessors } from "./datasets/Dataset";
export { loadDatasetMeta, saveDatasetMeta } from "./datasets/indexFile";
export { installMetadataAccessors, hasMetadataAccessors } from "./datasets/metadataAccessors";

// Table codecs
export type { TableCodec } from "./tables/TableCodec";
export { FeatherCodec } from "./tables/FeatherCodec";
export { CsvCodec, inferColumnType } from "./tables/CsvCodec";
export { TABLE_FORMATS, codecForFormat, codecForFile } from "./tables/formats";
export { sidecarPathFor, tableBaseName } from "./tables/sidecar";

// File helpers
export { md5File, md5OfFileDigests } from "./io/checksum";
export { writeFileAtomic } from "./io/atomicWrite";
