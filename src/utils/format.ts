export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/**
 * Split a comma separated stack list, dropping blanks and repeats
 */
export const parseStackList = (
  value: string,
  previous: string[] = []
): string[] => {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return [...new Set([...previous, ...names])];
};
