import { parentPort } from 'node:worker_threads';
import { parseImageRequest, resultTransferList, runImageJob, type ImageWorkerResponse } from './image-jobs';

if (!parentPort) {
  throw new Error('image.worker must be started as a worker thread.');
}
const port = parentPort;

port.on('message', (message: unknown) => {
  const request = parseImageRequest(message);
  if (!request) {
    throw new Error('Malformed image job.');
  }

  try {
    const result = runImageJob(request.job);
    port.postMessage({ id: request.id, ok: true, result } satisfies ImageWorkerResponse, resultTransferList(result));
  } catch (err) {
    port.postMessage({
      id: request.id,
      ok: false,
      error: err instanceof Error ? err.message : String(err),
    } satisfies ImageWorkerResponse);
  }
});
