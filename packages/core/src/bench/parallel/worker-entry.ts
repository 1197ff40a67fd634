import { isParentMessage } from './protocol.js';
import type { WorkerPort } from './transport.js';
import { BenchWorker } from './worker.js';

const port: WorkerPort = {
  send: (message) => {
    process.send?.(message);
  },
  onMessage: (listener) => {
    process.on('message', (raw: unknown) => {
      if (isParentMessage(raw)) listener(raw);
    });
  },
  close: () => {
    if (process.connected) process.disconnect();
  },
};

// Without a parent there is nobody to report to.
process.on('disconnect', () => {
  process.exit(0);
});

new BenchWorker(port).start();
