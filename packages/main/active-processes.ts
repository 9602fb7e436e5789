import log from 'electron-log/node';

export type VideoJob = AbortController;

const registry = new Map<string, VideoJob>();

export function addJob(id: string, job: VideoJob): void {
  if (registry.has(id)) {
    log.warn(`[registry] ID ${id} already registered, replacing it`);
  }
  log.info(`[registry] add job ${id}`);
  registry.set(id, job);
}

export function finish(id: string): void {
  if (registry.delete(id)) {
    log.info(`[registry] finished ${id}`);
  }
}

export function activeJobIds(): string[] {
  return [...registry.keys()];
}

export function cancel(id: string): boolean {
  const job = registry.get(id);
  if (!job) {
    log.warn(`[registry] cancel requested for unknown job ${id}`);
    return false;
  }
  job.abort();
  registry.delete(id);
  log.info(`[registry] cancelled ${id}`);
  return true;
}

export function cancelAll(): number {
  const ids = activeJobIds();
  for (const id of ids) cancel(id);
  return ids.length;
}
