export interface LoadingIndicatorController {
  element: HTMLElement;
  setLoading: (loading: boolean) => void;
  setProgress: (completed: number, total: number) => void;
  destroy: () => void;
}

// Minimum time loading must persist before showing indicator (ms)
const SHOW_DELAY_MS = 150;

/**
 * Pill at the bottom of the map with a progress bar and a
 * "Fetching data… (k/N)" label while partitions load.
 */
export const createLoadingIndicator = (): LoadingIndicatorController => {
  const wrapper = document.createElement("div");
  wrapper.id = "loading-indicator";
  wrapper.className = "loading-indicator hidden";

  const track = document.createElement("div");
  track.className = "loading-indicator__track";
  const bar = document.createElement("div");
  bar.id = "progress-bar";
  bar.className = "loading-indicator__bar";
  bar.style.width = "0%";
  track.appendChild(bar);

  const label = document.createElement("span");
  label.id = "progress-text";
  label.className = "loading-indicator__text";
  label.textContent = "Loading…";

  wrapper.appendChild(track);
  wrapper.appendChild(label);

  let showTimer: ReturnType<typeof setTimeout> | null = null;

  const clearTimer = () => {
    if (showTimer) {
      clearTimeout(showTimer);
      showTimer = null;
    }
  };

  const setLoading = (loading: boolean) => {
    clearTimer();
    if (loading) {
      bar.style.width = "0%";
      label.textContent = "Loading…";
      // Delay showing to avoid flicker when a partition comes back from cache
      showTimer = setTimeout(() => {
        wrapper.classList.remove("hidden");
      }, SHOW_DELAY_MS);
    } else {
      wrapper.classList.add("hidden");
    }
  };

  const setProgress = (completed: number, total: number) => {
    const pct = total > 0 ? Math.round((completed / total) * 100) : 0;
    bar.style.width = `${pct}%`;
    label.textContent = `Fetching data… (${completed}/${total})`;
  };

  return {
    element: wrapper,
    setLoading,
    setProgress,
    destroy: () => {
      clearTimer();
      wrapper.remove();
    },
  };
};
