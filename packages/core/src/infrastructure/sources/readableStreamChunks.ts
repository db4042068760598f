/**
 * Iterate a web `ReadableStream`. Stopping early cancels the stream so the
 * underlying resource (socket, file) is released.
 */
export async function* readableStreamChunks<T>(stream: ReadableStream<T>): AsyncGenerator<T> {
  const reader = stream.getReader();
  let settled = false;

  try {
    for (;;) {
      let step: Awaited<ReturnType<typeof reader.read>>;
      try {
        step = await reader.read();
      } catch (error) {
        settled = true;
        throw error;
      }
      if (step.done) {
        settled = true;
        return;
      }
      yield step.value;
    }
  } finally {
    if (!settled) await reader.cancel();
    reader.releaseLock();
  }
}
