export const MAX_DURATION_SECONDS = 24 * 60 * 60;

const UNIT_PATTERN = /(\d+(?:\.\d+)?)\s*(hours?|hrs?|hr|h|minutes?|mins?|min|m|seconds?|secs?|sec|s)\b/g;

function unitMultiplier(unit: string): number {
  if (unit.startsWith("h")) {
    return 3600;
  }
  if (unit.startsWith("m")) {
    return 60;
  }
  return 1;
}

/**
 * Accepts "90", "1:30", "1:02:03", "5 minutes", "1h 30m" or "2 min and 10 s".
 * Returns whole seconds.
 */
export function parseDurationSeconds(input: string): number {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new Error("Duration must not be empty.");
  }

  const clockMatch = normalized.match(/^(?:(\d+):)?(\d{1,2}):([0-5]?\d)$/);
  if (clockMatch) {
    const hours = clockMatch[1] ? Number(clockMatch[1]) : 0;
    const total = hours * 3600 + Number(clockMatch[2]) * 60 + Number(clockMatch[3]);
    if (total <= 0) {
      throw new Error("Duration must be greater than zero seconds.");
    }
    return total;
  }

  let totalFromUnits = 0;
  let matchedUnits = false;
  for (const match of normalized.matchAll(UNIT_PATTERN)) {
    matchedUnits = true;
    totalFromUnits += Math.round(Number(match[1]) * unitMultiplier(match[2]));
  }

  if (matchedUnits) {
    const leftover = normalized
      .replace(UNIT_PATTERN, " ")
      .replace(/\band\b/g, " ")
      .replace(/[,]/g, " ")
      .trim();
    if (leftover.length > 0) {
      throw new Error(`Could not parse duration "${input}".`);
    }
    if (totalFromUnits <= 0) {
      throw new Error("Duration must be greater than zero seconds.");
    }
    return totalFromUnits;
  }

  const bareSeconds = Number(normalized);
  if (Number.isFinite(bareSeconds) && bareSeconds > 0) {
    return Math.round(bareSeconds);
  }

  throw new Error(`Could not parse duration "${input}".`);
}
