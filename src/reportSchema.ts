/** Schema version stamped on every serialized error report. */
export const REPORT_SCHEMA_VERSION = '1';
