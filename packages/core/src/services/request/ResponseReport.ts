import { formatJson, type ResponseRecord } from "@reqdeck/shared";

const DIVIDER = "============================";

/** The text written to `--output` files. */
export const formatResponseReport = (record: ResponseRecord): string =>
  [
    `Request Method: ${record.method}`,
    `Status: ${record.status} ${record.reason}`,
    DIVIDER,
    "Headers:",
    formatJson(record.responseHeaders),
    DIVIDER,
    "Body:",
    record.body,
  ].join("\n");
