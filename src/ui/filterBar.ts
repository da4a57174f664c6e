import type { ViewerCatalog } from "../data/catalog";
import type { ViewStateInput } from "../lib/viewUrl";
import { ALL_REGIONS, CLASS_FILTER, type ViewState } from "../types/facility";

interface FilterBarOptions {
  catalog: ViewerCatalog;
  onChange: (patch: ViewStateInput) => void;
}

export interface FilterBarController {
  element: HTMLElement;
  setState: (state: ViewState) => void;
  setCount: (count: number) => void;
  setDisabled: (disabled: boolean) => void;
  destroy: () => void;
}

const createSelect = (id: string, labelText: string): { wrapper: HTMLLabelElement; select: HTMLSelectElement } => {
  const wrapper = document.createElement("label");
  wrapper.className = "filter-bar__field";
  wrapper.htmlFor = id;

  const label = document.createElement("span");
  label.className = "filter-bar__label";
  label.textContent = labelText;

  const select = document.createElement("select");
  select.id = id;
  select.className = "filter-bar__select";

  wrapper.appendChild(label);
  wrapper.appendChild(select);
  return { wrapper, select };
};

export const createFilterBar = ({ catalog, onChange }: FilterBarOptions): FilterBarController => {
  const header = document.createElement("header");
  header.className = "filter-bar";

  const brand = document.createElement("span");
  brand.className = "filter-bar__brand";
  brand.textContent = "WWTP Discharge Map";
  header.appendChild(brand);

  const pollutant = createSelect("pollutantFilter", "Nutrient");
  pollutant.select.add(new Option("-- All Nutrients --", ""));
  catalog.pollutants.forEach((name) => pollutant.select.add(new Option(name, name)));

  const region = createSelect("stateFilter", "State");
  region.select.add(new Option("-- Select State --", ""));
  region.select.add(new Option("-- All States --", ALL_REGIONS));
  catalog.regions.forEach((code) => region.select.add(new Option(code, code)));

  const year = createSelect("yearFilter", "Year");
  year.select.add(new Option("-- Select Year --", ""));
  catalog.years.forEach((value) => year.select.add(new Option(value, value)));

  const classFilter = createSelect("adFilter", "Facility Type");
  classFilter.select.add(new Option("All Facilities", CLASS_FILTER.ALL));
  classFilter.select.add(new Option("Only Anaerobic Digestion", CLASS_FILTER.ONLY));
  classFilter.select.add(new Option("Exclude Anaerobic Digestion", CLASS_FILTER.EXCLUDE));

  const count = document.createElement("span");
  count.className = "filter-bar__count";
  const countValue = document.createElement("strong");
  countValue.id = "site-count-value";
  countValue.textContent = "0";
  count.append("Sites: ", countValue);

  for (const field of [pollutant, region, year, classFilter]) {
    header.appendChild(field.wrapper);
  }
  header.appendChild(count);

  const handlers: Array<[HTMLSelectElement, () => void]> = [
    [pollutant.select, () => onChange({ pollutant: pollutant.select.value })],
    [region.select, () => onChange({ region: region.select.value })],
    [year.select, () => onChange({ year: year.select.value })],
    [classFilter.select, () => onChange({ classFilter: classFilter.select.value })],
  ];
  handlers.forEach(([select, handler]) => select.addEventListener("change", handler));

  const setState = (state: ViewState) => {
    pollutant.select.value = state.pollutant;
    region.select.value = state.region ?? "";
    year.select.value = state.year ?? "";
    classFilter.select.value = state.classFilter;
  };

  const setCount = (value: number) => {
    countValue.textContent = `${value}`;
  };

  const setDisabled = (disabled: boolean) => {
    handlers.forEach(([select]) => {
      select.disabled = disabled;
    });
  };

  return {
    element: header,
    setState,
    setCount,
    setDisabled,
    destroy: () => {
      handlers.forEach(([select, handler]) => select.removeEventListener("change", handler));
    },
  };
};
