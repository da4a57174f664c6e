export interface NotificationBarController {
  element: HTMLElement;
  show: (message: string, options?: { isError?: boolean; persistent?: boolean }) => void;
  hide: () => void;
  destroy: () => void;
}

const AUTO_HIDE_MS = 5000;

export const createNotificationBar = (): NotificationBarController => {
  const bar = document.createElement("div");
  bar.id = "notification-bar";
  bar.setAttribute("role", "alert");
  bar.style.display = "none";

  let hideTimer: ReturnType<typeof setTimeout> | null = null;

  const clearTimer = () => {
    if (hideTimer) {
      clearTimeout(hideTimer);
      hideTimer = null;
    }
  };

  const hide = () => {
    clearTimer();
    bar.style.display = "none";
  };

  const show: NotificationBarController["show"] = (message, { isError = true, persistent = false } = {}) => {
    clearTimer();
    bar.textContent = message;
    bar.className = isError ? "error" : "success";
    bar.style.display = "block";
    if (!persistent) {
      hideTimer = setTimeout(hide, AUTO_HIDE_MS);
    }
  };

  return {
    element: bar,
    show,
    hide,
    destroy: () => {
      clearTimer();
      bar.remove();
    },
  };
};
