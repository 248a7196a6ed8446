/** First character upper-cased, the rest lower-cased. */
export function capitalize(value: string): string {
  if (value === "") {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/** "delay_fertilizer" -> "delay fertilizer". */
export function humanizeCode(code: string): string {
  return code.replace(/_/g, " ");
}

export function truncateCodePoints(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  return codePoints.length <= maxLength ? value : codePoints.slice(0, maxLength).join("");
}
