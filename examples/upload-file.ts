/**
 * Upload File Example
 *
 * Uploads one file to a resource, printing progress as chunks finish.
 *
 * Usage:
 *   TRANSFER_USER=me TRANSFER_TOKEN=... npx tsx examples/upload-file.ts KEY-123 ./archive.tar.gz
 */

import {
  ConsoleLogger,
  InMemoryMetrics,
  MetricNames,
  TransferError,
  createTransferClientFromEnv,
} from '../src/index.js';

async function main(): Promise<void> {
  const [resourceKey, filePath] = process.argv.slice(2);
  if (!resourceKey || !filePath) {
    console.error('Usage: upload-file.ts KEY FILEPATH');
    process.exitCode = 1;
    return;
  }

  const metrics = new InMemoryMetrics();
  const client = createTransferClientFromEnv({
    observability: { logger: new ConsoleLogger({ level: 'info' }), metrics },
  });

  // Ctrl-C cancels in-flight requests
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const result = await client.uploadFile(filePath, resourceKey, {
      signal: controller.signal,
      onProgress: (progress) => {
        console.log(`Uploading: ${progress.completedChunks} / ${progress.estimatedChunks}`);
      },
    });

    console.log(`Successfully uploaded ${filePath} to ${resourceKey}`);
    console.log('Upload ID:', result.uploadId);
    console.log(`Chunks: ${result.chunks.length} (${result.deduplicatedChunks} already stored)`);
    console.log('Retries:', metrics.getCounter(MetricNames.RETRIES_TOTAL));
  } catch (error) {
    if (error instanceof TransferError) {
      console.error('Error:', error.message);
      console.error('Code:', error.code);
    } else {
      console.error('Error:', error);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
