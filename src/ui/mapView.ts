import maplibregl from "maplibre-gl";

import { hasFiniteCoordinates } from "../lib/proximity";
import type { FacilityRecord } from "../types/facility";
import {
  SATELLITE_ATTRIBUTION,
  SATELLITE_TILES_URL,
  createBaseLayerSwitcher,
  type BaseLayer,
} from "./baseLayerSwitcher";

interface MapViewOptions {
  styleUrl: string;
}

export interface MapViewController {
  element: HTMLElement;
  setFacilities: (records: FacilityRecord[], nearReference: ReadonlySet<string>) => void;
  clear: () => void;
  fitToFacilities: () => void;
  destroy: () => void;
}

export const MARKER_COLORS = {
  AD_FACILITY: "#4CAF50",
  OTHER_FACILITY: "#0078A8",
} as const;

const US_CENTER: [number, number] = [-98.5795, 39.8283];
const US_ZOOM = 3.5;

const SATELLITE_SOURCE_ID = "satellite";
const SATELLITE_LAYER_ID = "satellite-imagery";
const SOURCE_ID = "facilities";
const LAYER_CLUSTERS_ID = "facilities-clusters";
const LAYER_CLUSTER_COUNT_ID = "facilities-cluster-count";
const LAYER_POINTS_ID = "facilities-points";

type FacilityFeatureProps = {
  // Index into the rendered record list; a permit can appear once per pollutant.
  idx: number;
  id: string;
  nearReference: boolean;
};

type FC = GeoJSON.FeatureCollection<GeoJSON.Point, FacilityFeatureProps>;

const emptyFC = (): FC => ({ type: "FeatureCollection", features: [] });

const buildPopupContent = (record: FacilityRecord, nearReference: boolean): HTMLElement => {
  const popup = document.createElement("div");
  popup.className = "facility-popup";

  const title = document.createElement("strong");
  title.textContent = record.id;
  popup.appendChild(title);

  const pollutant = document.createElement("p");
  pollutant.textContent = `Nutrient: ${record.pollutant}`;
  popup.appendChild(pollutant);

  if (nearReference) {
    const badge = document.createElement("p");
    badge.className = "facility-popup__badge";
    badge.textContent = "Near an anaerobic digestion facility";
    popup.appendChild(badge);
  }

  const list = document.createElement("ul");
  list.className = "facility-popup__measurements";
  for (const m of record.measurements) {
    const item = document.createElement("li");
    item.textContent = `${m.date}: ${m.value} ${record.unit}`.trim();
    list.appendChild(item);
  }
  popup.appendChild(list);
  return popup;
};

const createLegend = (): HTMLElement => {
  const legend = document.createElement("div");
  legend.className = "map-legend";

  const title = document.createElement("div");
  title.className = "map-legend__title";
  title.textContent = "Facility Type";
  legend.appendChild(title);

  const entries = [
    { color: MARKER_COLORS.AD_FACILITY, text: "Anaerobic Digestion" },
    { color: MARKER_COLORS.OTHER_FACILITY, text: "Other Facility" },
  ];
  for (const entry of entries) {
    const row = document.createElement("div");
    row.className = "map-legend__row";
    const swatch = document.createElement("i");
    swatch.style.background = entry.color;
    const label = document.createElement("span");
    label.textContent = entry.text;
    row.appendChild(swatch);
    row.appendChild(label);
    legend.appendChild(row);
  }
  return legend;
};

export const createMapView = ({ styleUrl }: MapViewOptions): MapViewController => {
  const container = document.createElement("section");
  container.className = "map-view";

  const mapNode = document.createElement("div");
  mapNode.className = "map-view__canvas";
  container.appendChild(mapNode);

  const resetButton = document.createElement("button");
  resetButton.type = "button";
  resetButton.className = "map-view__reset hidden";
  resetButton.title = "Reset View";
  resetButton.textContent = "⌖";
  container.appendChild(resetButton);

  container.appendChild(createLegend());

  const baseLayerSwitcher = createBaseLayerSwitcher({
    onChange: (layer) => applyBaseLayer(layer),
  });
  container.appendChild(baseLayerSwitcher.element);

  const map = new maplibregl.Map({
    container: mapNode,
    style: styleUrl,
    center: US_CENTER,
    zoom: US_ZOOM,
    attributionControl: false,
  });

  map.dragRotate.disable();
  map.touchZoomRotate.disableRotation();

  map.addControl(new maplibregl.AttributionControl({ compact: true }), "bottom-left");
  map.addControl(new maplibregl.NavigationControl({ showCompass: false }), "top-right");

  let lastData: FC = emptyFC();
  let lastRecords: FacilityRecord[] = [];
  let pendingFit = false;
  let activePopup: maplibregl.Popup | null = null;

  const pushData = () => {
    const source = map.getSource(SOURCE_ID);
    if (source instanceof maplibregl.GeoJSONSource) {
      source.setData(lastData);
    }
  };

  const satelliteVisibility = (layer: BaseLayer) => (layer === "satellite" ? "visible" : "none");

  const applyBaseLayer = (layer: BaseLayer) => {
    if (!map.getLayer(SATELLITE_LAYER_ID)) return;
    map.setLayoutProperty(SATELLITE_LAYER_ID, "visibility", satelliteVisibility(layer));
  };

  const ensureSourcesAndLayers = () => {
    if (!map.isStyleLoaded()) return;

    // Imagery sits above the vector basemap and below the facility layers.
    if (!map.getSource(SATELLITE_SOURCE_ID)) {
      map.addSource(SATELLITE_SOURCE_ID, {
        type: "raster",
        tiles: [SATELLITE_TILES_URL],
        tileSize: 256,
        attribution: SATELLITE_ATTRIBUTION,
      });
    }

    if (!map.getLayer(SATELLITE_LAYER_ID)) {
      map.addLayer({
        id: SATELLITE_LAYER_ID,
        type: "raster",
        source: SATELLITE_SOURCE_ID,
        layout: { visibility: satelliteVisibility(baseLayerSwitcher.getSelected()) },
      });
    }

    if (!map.getSource(SOURCE_ID)) {
      map.addSource(SOURCE_ID, {
        type: "geojson",
        data: emptyFC(),
        cluster: true,
        clusterMaxZoom: 12,
        clusterRadius: 50,
      });
    }

    if (!map.getLayer(LAYER_CLUSTERS_ID)) {
      map.addLayer({
        id: LAYER_CLUSTERS_ID,
        type: "circle",
        source: SOURCE_ID,
        filter: ["has", "point_count"],
        paint: {
          "circle-color": MARKER_COLORS.OTHER_FACILITY,
          "circle-opacity": 0.85,
          "circle-radius": ["step", ["get", "point_count"], 14, 10, 18, 100, 24],
          "circle-stroke-color": "#ffffff",
          "circle-stroke-width": 2,
        },
      });
    }

    if (!map.getLayer(LAYER_CLUSTER_COUNT_ID)) {
      map.addLayer({
        id: LAYER_CLUSTER_COUNT_ID,
        type: "symbol",
        source: SOURCE_ID,
        filter: ["has", "point_count"],
        layout: {
          "text-field": ["get", "point_count_abbreviated"],
          "text-font": ["literal", ["Open Sans Bold", "Arial Unicode MS Bold"]],
          "text-size": 12,
        },
        paint: {
          "text-color": "#ffffff",
        },
      });
    }

    if (!map.getLayer(LAYER_POINTS_ID)) {
      map.addLayer({
        id: LAYER_POINTS_ID,
        type: "circle",
        source: SOURCE_ID,
        filter: ["!", ["has", "point_count"]],
        paint: {
          "circle-radius": 6,
          "circle-color": [
            "case",
            ["get", "nearReference"],
            MARKER_COLORS.AD_FACILITY,
            MARKER_COLORS.OTHER_FACILITY,
          ],
          "circle-stroke-color": "#ffffff",
          "circle-stroke-width": 2,
        },
      });
    }

    pushData();
    if (pendingFit) {
      pendingFit = false;
      fitToFacilities();
    }
  };

  const closePopup = () => {
    activePopup?.remove();
    activePopup = null;
  };

  map.once("load", () => {
    ensureSourcesAndLayers();

    map.on("mouseenter", LAYER_POINTS_ID, () => {
      map.getCanvas().style.cursor = "pointer";
    });
    map.on("mouseleave", LAYER_POINTS_ID, () => {
      map.getCanvas().style.cursor = "";
    });
    map.on("click", LAYER_POINTS_ID, (e) => {
      const feature = e.features?.[0];
      if (!feature || feature.geometry.type !== "Point") return;
      const idx: unknown = feature.properties?.idx;
      const record = typeof idx === "number" ? lastRecords[idx] : undefined;
      if (!record) return;
      const [lng, lat] = feature.geometry.coordinates;
      closePopup();
      activePopup = new maplibregl.Popup({ maxWidth: "320px" })
        .setLngLat([lng, lat])
        .setDOMContent(buildPopupContent(record, feature.properties?.nearReference === true))
        .addTo(map);
    });

    map.on("mouseenter", LAYER_CLUSTERS_ID, () => {
      map.getCanvas().style.cursor = "pointer";
    });
    map.on("mouseleave", LAYER_CLUSTERS_ID, () => {
      map.getCanvas().style.cursor = "";
    });
    map.on("click", LAYER_CLUSTERS_ID, async (e) => {
      const feature = e.features?.[0];
      if (!feature || feature.geometry.type !== "Point") return;
      const clusterId: unknown = feature.properties?.cluster_id;
      const source = map.getSource(SOURCE_ID);
      if (!(source instanceof maplibregl.GeoJSONSource) || typeof clusterId !== "number") return;
      try {
        const zoom = await source.getClusterExpansionZoom(clusterId);
        const [lng, lat] = feature.geometry.coordinates;
        map.easeTo({ center: [lng, lat], zoom });
      } catch (error) {
        console.warn("[mapView] Failed to expand cluster", error);
      }
    });
  });

  map.on("styledata", () => {
    ensureSourcesAndLayers();
  });

  const fitToFacilities = () => {
    const features = lastData.features;
    if (!features.length) return;
    const [firstLng, firstLat] = features[0].geometry.coordinates;
    const bounds = new maplibregl.LngLatBounds([firstLng, firstLat], [firstLng, firstLat]);
    for (let i = 1; i < features.length; i++) {
      const [lng, lat] = features[i].geometry.coordinates;
      bounds.extend([lng, lat]);
    }
    map.fitBounds(bounds, { padding: 60, duration: 400, maxZoom: 12 });
  };

  const setFacilities = (records: FacilityRecord[], nearReference: ReadonlySet<string>) => {
    closePopup();
    lastRecords = records;
    const features: FC["features"] = [];
    records.forEach((record, idx) => {
      if (!hasFiniteCoordinates(record)) return;
      features.push({
        type: "Feature",
        properties: { idx, id: record.id, nearReference: nearReference.has(record.id) },
        geometry: { type: "Point", coordinates: [record.longitude, record.latitude] },
      });
    });
    lastData = { type: "FeatureCollection", features };
    resetButton.classList.toggle("hidden", features.length === 0);

    pushData();
    if (map.isStyleLoaded()) {
      fitToFacilities();
    } else {
      pendingFit = true;
    }
  };

  const clear = () => {
    closePopup();
    lastRecords = [];
    lastData = emptyFC();
    pendingFit = false;
    resetButton.classList.add("hidden");
    pushData();
  };

  const handleReset = () => fitToFacilities();
  resetButton.addEventListener("click", handleReset);

  const resizeObserver = new ResizeObserver(() => {
    map.resize();
  });
  resizeObserver.observe(container);

  return {
    element: container,
    setFacilities,
    clear,
    fitToFacilities,
    destroy: () => {
      resizeObserver.disconnect();
      resetButton.removeEventListener("click", handleReset);
      baseLayerSwitcher.destroy();
      closePopup();
      map.remove();
    },
  };
};
