import type { ViewerCatalog } from "../data/catalog";
import { logCrash } from "../lib/crashLog";
import { PartitionNotFoundError, describeError } from "../lib/errors";
import { filterDisplaySet } from "../lib/filters";
import type { RecordsQuery } from "../lib/partitions";
import { buildGridIndex, findNearReference, type GridIndex } from "../lib/proximity";
import {
  getViewStateFromUrl,
  sanitizeViewState,
  updateUrlWithViewState,
  type ViewStateInput,
} from "../lib/viewUrl";
import type {
  DisplaySink,
  FacilityRecord,
  FetchProgress,
  ReferenceLocation,
  ViewState,
} from "../types/facility";

export type ViewStatus = "idle" | "loading" | "ready" | "error";

export interface ViewSnapshot {
  status: ViewStatus;
  state: ViewState;
  progress: FetchProgress | null;
  count: number;
  error: string | null;
  generation: number;
}

export interface ViewStateStorage {
  read: () => ViewState;
  write: (state: ViewState) => void;
}

export type RecordsLoader = (
  query: RecordsQuery,
  options: { signal: AbortSignal; onProgress: (progress: FetchProgress) => void },
) => Promise<FacilityRecord[]>;

export interface ViewReconcilerOptions {
  catalog: ViewerCatalog;
  references: readonly ReferenceLocation[];
  sink: DisplaySink;
  loadRecords: RecordsLoader;
  /** Where the restorable state lives; defaults to the page URL */
  storage?: ViewStateStorage;
}

type Listener = (snapshot: ViewSnapshot) => void;

// Records and classification for one region/year. Replaced wholesale, never patched.
interface QueryEpoch {
  key: string;
  records: FacilityRecord[];
  nearReference: ReadonlySet<string>;
}

const epochKey = (year: string, region: string) => `${year}::${region}`;

export const createUrlStorage = (catalog: ViewerCatalog): ViewStateStorage => ({
  read: () => getViewStateFromUrl(catalog),
  write: (state) => updateUrlWithViewState(state),
});

/**
 * Sole owner of the viewer state. Every control change goes through `update`,
 * which mirrors the state to storage and drives fetch -> classify -> filter.
 * Each request carries a generation; a settlement from an older generation is
 * dropped at the point it would be applied.
 */
export class ViewReconciler {
  private listeners = new Set<Listener>();
  private readonly catalog: ViewerCatalog;
  private readonly sink: DisplaySink;
  private readonly loadRecords: RecordsLoader;
  private readonly storage: ViewStateStorage;
  private readonly grid: GridIndex;
  private state: ViewState;
  private snapshot: ViewSnapshot;
  private generation = 0;
  private epoch: QueryEpoch | null = null;
  private inflight: AbortController | null = null;

  constructor({ catalog, references, sink, loadRecords, storage }: ViewReconcilerOptions) {
    this.catalog = catalog;
    this.sink = sink;
    this.loadRecords = loadRecords;
    this.storage = storage ?? createUrlStorage(catalog);
    this.grid = buildGridIndex(references);
    this.state = sanitizeViewState({}, catalog);
    this.snapshot = {
      status: "idle",
      state: { ...this.state },
      progress: null,
      count: 0,
      error: null,
      generation: 0,
    };
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    listener(this.snapshot);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getState(): ViewState {
    return { ...this.state };
  }

  getSnapshot(): ViewSnapshot {
    return this.snapshot;
  }

  start(): Promise<void> {
    return this.apply(this.storage.read());
  }

  update(patch: ViewStateInput): Promise<void> {
    const next = sanitizeViewState({ ...this.state, ...patch }, this.catalog);
    return this.apply(next);
  }

  destroy() {
    this.generation += 1;
    this.inflight?.abort();
    this.inflight = null;
    this.epoch = null;
    this.listeners.clear();
  }

  private emit() {
    this.listeners.forEach((listener) => listener(this.snapshot));
  }

  private publish(next: Omit<ViewSnapshot, "state" | "generation">) {
    this.snapshot = { ...next, state: { ...this.state }, generation: this.generation };
    this.emit();
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  private async apply(next: ViewState): Promise<void> {
    this.state = next;
    this.storage.write(next);

    const generation = ++this.generation;
    this.inflight?.abort();
    this.inflight = null;

    const { region, year } = next;
    if (!region || !year) {
      this.epoch = null;
      this.sink.setLoading(false);
      this.sink.clearRendering();
      this.sink.reportCount(0);
      this.publish({ status: "idle", progress: null, count: 0, error: null });
      return;
    }

    const key = epochKey(year, region);
    if (this.epoch && this.epoch.key === key) {
      // Pollutant/class changes reuse the loaded records and classification.
      this.render(this.epoch, year);
      return;
    }

    this.epoch = null;
    const controller = new AbortController();
    this.inflight = controller;
    this.sink.setLoading(true);
    this.publish({ status: "loading", progress: null, count: 0, error: null });

    let records: FacilityRecord[];
    try {
      records = await this.loadRecords(
        { year, region },
        {
          signal: controller.signal,
          onProgress: (progress) => {
            if (!this.isCurrent(generation)) return;
            this.sink.reportProgress(progress.completed, progress.total);
            this.publish({ status: "loading", progress, count: 0, error: null });
          },
        },
      );
    } catch (error) {
      if (!this.isCurrent(generation)) return;
      this.fail(error, region, year);
      return;
    }

    if (!this.isCurrent(generation)) {
      console.info(`[viewReconciler] Dropped superseded response for ${region} ${year}`);
      return;
    }
    this.inflight = null;

    const nearReference = findNearReference(records, this.grid);
    console.info(
      `[viewReconciler] Identified ${nearReference.size} AD facilities among ${records.length} records`,
    );
    const epoch: QueryEpoch = { key, records, nearReference };
    this.epoch = epoch;
    this.render(epoch, year);
  }

  private render(epoch: QueryEpoch, year: string) {
    const { records, count } = filterDisplaySet(
      epoch.records,
      { pollutant: this.state.pollutant, year, classFilter: this.state.classFilter },
      epoch.nearReference,
    );
    this.sink.setLoading(false);
    this.sink.renderDisplaySet(records, epoch.nearReference);
    this.sink.reportCount(count);
    this.publish({ status: "ready", progress: null, count, error: null });
  }

  private fail(error: unknown, region: string, year: string) {
    this.inflight = null;
    this.epoch = null;
    const message = describeError(error, `Could not load data for ${region} ${year}.`);
    if (error instanceof PartitionNotFoundError) {
      console.warn(`[viewReconciler] ${message}`);
    } else {
      logCrash("viewReconciler", error, { region, year });
    }
    this.sink.setLoading(false);
    this.sink.clearRendering();
    this.sink.reportCount(0);
    this.sink.reportError(message);
    this.publish({ status: "error", progress: null, count: 0, error: message });
  }
}
