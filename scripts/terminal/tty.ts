export function isTerminal(stream: unknown): boolean {
  if (typeof stream !== "object" || stream === null) return false;
  return "isTTY" in stream && stream.isTTY === true;
}
