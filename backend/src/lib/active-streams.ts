// In-flight SSE requests, aborted together on shutdown.
const activeStreams = new Set<AbortController>();

export function trackStream(controller: AbortController): void {
  activeStreams.add(controller);
  controller.signal.addEventListener("abort", () => {
    activeStreams.delete(controller);
  });
}

export function untrackStream(controller: AbortController): void {
  activeStreams.delete(controller);
}

export function abortAllStreams(): number {
  const count = activeStreams.size;
  for (const controller of activeStreams) {
    controller.abort();
  }
  activeStreams.clear();
  return count;
}
