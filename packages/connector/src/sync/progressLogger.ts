export interface ProgressLoggerOptions {
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  onPage: (entityId: string, recordCount: number) => void;
  onMappingErrors: (entityId: string, errorCount: number) => void;
  onFlush: (entityId: string, rowCount: number, cursor: string | null) => void;
  flush: () => void;
}

export function createProgressLogger(options: ProgressLoggerOptions): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let pagesFetched = 0;
  let recordsFetched = 0;
  let rowsCommitted = 0;
  let mappingErrors = 0;
  let flushes = 0;
  let latestCursor: string | null = null;
  const entities = new Set<string>();

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const recordsPerSecond = recordsFetched / elapsedSeconds;

    log(
      `sync progress (entities=${entities.size}, pages=${pagesFetched}, records=${recordsFetched}, committed=${rowsCommitted}, mappingErrors=${mappingErrors}, flushes=${flushes}, rps=${recordsPerSecond.toFixed(1)}, cursor=${latestCursor ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onPage(entityId: string, recordCount: number): void {
      pagesFetched += 1;
      recordsFetched += recordCount;
      entities.add(entityId);
      maybeLog(false);
    },
    onMappingErrors(entityId: string, errorCount: number): void {
      mappingErrors += errorCount;
      entities.add(entityId);
      maybeLog(false);
    },
    onFlush(entityId: string, rowCount: number, cursor: string | null): void {
      flushes += 1;
      rowsCommitted += rowCount;
      entities.add(entityId);
      latestCursor = cursor;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
