import { DEFAULT_CATALOG, type ViewerCatalog } from "../data/catalog";
import { initCrashLog, logCrash } from "../lib/crashLog";
import { describeError } from "../lib/errors";
import { getViewerConfig, type ViewerConfig } from "../lib/env";
import { fetchRecords } from "../lib/partitions";
import { loadReferenceLocations } from "../lib/referenceLocations";
import { ViewReconciler, type RecordsLoader } from "../state/viewReconciler";
import type { DisplaySink } from "../types/facility";
import { createFilterBar } from "./filterBar";
import { createLoadingIndicator } from "./loadingIndicator";
import { createMapView } from "./mapView";
import { createNotificationBar } from "./notificationBar";

export interface AppInstance {
  destroy: () => void;
}

interface AppOptions {
  config?: ViewerConfig;
  catalog?: ViewerCatalog;
}

const createRecordsLoader = (config: ViewerConfig, catalog: ViewerCatalog): RecordsLoader =>
  (query, { signal, onProgress }) =>
    fetchRecords(query, catalog.regions, {
      baseUrl: config.dataBaseUrl,
      signal,
      onProgress,
      verbose: config.verbose,
    });

export const createApp = (root: HTMLElement, options: AppOptions = {}): AppInstance => {
  const config = options.config ?? getViewerConfig();
  const catalog = options.catalog ?? DEFAULT_CATALOG;

  initCrashLog();
  root.innerHTML = "";
  root.className = "viewer";

  let reconciler: ViewReconciler | null = null;
  let unsubscribe: (() => void) | null = null;
  let destroyed = false;

  const filterBar = createFilterBar({
    catalog,
    onChange: (patch) => {
      if (!reconciler) return;
      reconciler.update(patch).catch((error) => logCrash("app", error, { patch }));
    },
  });
  filterBar.setDisabled(true);

  const layout = document.createElement("main");
  layout.className = "viewer__layout";

  const mapView = createMapView({ styleUrl: config.mapStyleUrl });
  const loadingIndicator = createLoadingIndicator();
  const notificationBar = createNotificationBar();

  mapView.element.appendChild(loadingIndicator.element);
  layout.appendChild(mapView.element);

  root.appendChild(filterBar.element);
  root.appendChild(notificationBar.element);
  root.appendChild(layout);

  const sink: DisplaySink = {
    renderDisplaySet: (records, nearReference) => mapView.setFacilities(records, nearReference),
    clearRendering: () => mapView.clear(),
    reportCount: (count) => filterBar.setCount(count),
    reportProgress: (completed, total) => loadingIndicator.setProgress(completed, total),
    reportError: (message) => notificationBar.show(message),
    setLoading: (loading) => loadingIndicator.setLoading(loading),
  };

  // Proximity classification needs the AD list, so nothing starts without it.
  const abortReferences = new AbortController();
  loadingIndicator.setLoading(true);
  loadReferenceLocations(config.referenceCsvUrl, { signal: abortReferences.signal })
    .then((references) => {
      if (destroyed) return;
      const instance = new ViewReconciler({
        catalog,
        references,
        sink,
        loadRecords: createRecordsLoader(config, catalog),
      });
      reconciler = instance;
      unsubscribe = instance.subscribe((snapshot) => filterBar.setState(snapshot.state));
      filterBar.setDisabled(false);
      return instance.start();
    })
    .catch((error) => {
      if (destroyed) return;
      loadingIndicator.setLoading(false);
      logCrash("app", error);
      notificationBar.show(
        `${describeError(error, "Could not load the AD facility list.")} The application cannot start.`,
        { persistent: true },
      );
    });

  return {
    destroy: () => {
      destroyed = true;
      abortReferences.abort();
      unsubscribe?.();
      reconciler?.destroy();
      filterBar.destroy();
      loadingIndicator.destroy();
      notificationBar.destroy();
      mapView.destroy();
      root.innerHTML = "";
    },
  };
};
