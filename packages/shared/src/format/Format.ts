const SIZE_UNITS = ["B", "KB", "MB", "GB"];

export const formatSize = (bytes: number): string => {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) return `${value.toFixed(2)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(2)} TB`;
};

export const formatElapsed = (elapsedMs: number): string => `${elapsedMs.toFixed(2)} ms`;

export const formatJson = (value: unknown): string => JSON.stringify(value, null, 2);

/** Pretty-prints a response body when it is JSON; other text is returned unchanged. */
export const renderBody = (raw: string): string => {
  try {
    return formatJson(JSON.parse(raw));
  } catch {
    return raw;
  }
};
