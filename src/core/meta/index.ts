export {
  DatasetMeta,
  DATASET_META_FIELDS,
  type DatasetMetaFields,
  type Source,
  type License,
} from "./DatasetMeta";
export {
  TableMeta,
  TABLE_NAME_PATTERN,
  isValidTableName,
  parseTableSidecar,
  buildTableSidecar,
  type TableMetaInit,
  type TableSidecar,
} from "./TableMeta";
export { VariableMeta, type VariableMetaFields } from "./VariableMeta";
export {
  DatasetMetaJsonSchema,
  TableMetaJsonSchema,
  VariableMetaJsonSchema,
  type DatasetMetaJson,
  type TableMetaJson,
  type VariableMetaJson,
} from "./schemas";
