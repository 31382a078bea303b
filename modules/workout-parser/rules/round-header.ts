// "2x thru", "3 rounds", "4x:" but not "4x100 free" or "2:00 easy".
const ROUND_HEADER_REGEX = /^(\d+)\s*[x×]?\s*(?:rounds?\b|through\b|thru\b|:(?!\d))/i;

export function extractRoundCount(line: string): number | null {
  const match = ROUND_HEADER_REGEX.exec(line.trim());
  if (!match) return null;
  const count = Number(match[1]);
  return Number.isInteger(count) && count >= 1 ? count : null;
}
