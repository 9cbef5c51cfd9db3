/**
 * Composite probe score: higher is better, only meaningful relative to other scores
 */
export function scoreProbe(latency: number, throughput: number): number {
  const safeLatency = Number.isFinite(latency) ? Math.max(0, latency) : Number.MAX_VALUE;
  const safeThroughput = Number.isFinite(throughput) ? Math.max(0, throughput) : 0;
  return 1000 / (safeLatency + 1) + safeThroughput;
}
