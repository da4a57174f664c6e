export type BaseLayer = "streets" | "satellite";

export const SATELLITE_TILES_URL =
  "https://server.arcgisonline.com/ArcGIS/rest/services/World_Imagery/MapServer/tile/{z}/{y}/{x}";
export const SATELLITE_ATTRIBUTION = "Tiles &copy; Esri";

const OPTIONS: ReadonlyArray<{ value: BaseLayer; label: string }> = [
  { value: "streets", label: "Map" },
  { value: "satellite", label: "Satellite" },
];

interface BaseLayerSwitcherOptions {
  initial?: BaseLayer;
  onChange: (layer: BaseLayer) => void;
}

export interface BaseLayerSwitcherController {
  element: HTMLElement;
  getSelected: () => BaseLayer;
  destroy: () => void;
}

export const createBaseLayerSwitcher = ({
  initial = "streets",
  onChange,
}: BaseLayerSwitcherOptions): BaseLayerSwitcherController => {
  const element = document.createElement("div");
  element.className = "base-layer-switcher";
  element.setAttribute("role", "group");
  element.setAttribute("aria-label", "Base map");

  let selected: BaseLayer = initial;
  const buttons: Array<{ value: BaseLayer; button: HTMLButtonElement; onClick: () => void }> = [];

  const sync = () => {
    for (const { value, button } of buttons) {
      const isSelected = value === selected;
      button.classList.toggle("base-layer-switcher__option--active", isSelected);
      button.setAttribute("aria-pressed", `${isSelected}`);
    }
  };

  for (const option of OPTIONS) {
    const button = document.createElement("button");
    button.type = "button";
    button.className = "base-layer-switcher__option";
    button.textContent = option.label;
    const onClick = () => {
      if (option.value === selected) return;
      selected = option.value;
      sync();
      onChange(option.value);
    };
    button.addEventListener("click", onClick);
    buttons.push({ value: option.value, button, onClick });
    element.appendChild(button);
  }
  sync();

  return {
    element,
    getSelected: () => selected,
    destroy: () => {
      for (const { button, onClick } of buttons) button.removeEventListener("click", onClick);
    },
  };
};
