export {
  SQUEUE_FIELDS,
  SQUEUE_DELIMITER,
  ADDITIVE_COUNTERS,
  HOSTLIST_MAX_SIZE,
  EMPTY_NODELISTS,
  SGE_DIRECT_ENV,
  SGE_ARRAY_ENV,
  DEFAULT_CONFIG,
} from "./constants.ts";
export type {
  CounterKey,
  JobCounters,
  SqueueFieldName,
  SqueueField,
  SqueueRow,
  JobFilters,
  GroupLimits,
  OutputFormat,
  ReportCell,
  ReportRow,
  HpcConfig,
} from "./types.ts";
