/**
 * Init scripts installed on optimized pages. Each runs in every document the
 * page loads, before the page's own scripts.
 */

/** Near-zero animation and transition durations. */
export const DISABLE_ANIMATIONS_SCRIPT = `
(() => {
  const install = () => {
    const style = document.createElement("style");
    style.textContent = "*, *::before, *::after { animation-duration: 0.001s !important; transition-duration: 0.001s !important; }";
    document.head.appendChild(style);
  };
  if (document.head) install();
  else document.addEventListener("DOMContentLoaded", install, { once: true });
})();
`;

/** Remove positioned cookie banners, popups and modals after load, then every 2s. */
export const DISMISS_OVERLAYS_SCRIPT = `
(() => {
  const selectors = [
    '[class*="cookie"]', '[class*="popup"]', '[class*="modal"]', '[class*="overlay"]',
    '[id*="cookie"]', '[id*="popup"]', '[id*="modal"]', '[id*="overlay"]',
  ];
  const removeOverlays = () => {
    for (const selector of selectors) {
      document.querySelectorAll(selector).forEach((el) => {
        const position = window.getComputedStyle(el).position;
        if (position === "fixed" || position === "absolute") el.remove();
      });
    }
    if (document.body && document.body.style.overflow === "hidden") {
      document.body.style.overflow = "auto";
    }
  };
  window.addEventListener("load", () => {
    removeOverlays();
    setInterval(removeOverlays, 2000);
  });
})();
`;

/** Log unhandled promise rejections as warnings instead of page errors. */
export const SUPPRESS_UNHANDLED_REJECTIONS_SCRIPT = `
window.addEventListener("unhandledrejection", (event) => {
  console.warn("Unhandled promise rejection:", event.reason);
  event.preventDefault();
});
`;

export const VIEWPORT_META_SCRIPT = `
(() => {
  const install = () => {
    const meta = document.createElement("meta");
    meta.setAttribute("name", "viewport");
    meta.setAttribute("content", "width=device-width, initial-scale=1, maximum-scale=1");
    document.head.appendChild(meta);
  };
  if (document.head) install();
  else document.addEventListener("DOMContentLoaded", install, { once: true });
})();
`;

export const OPTIMIZED_PAGE_SCRIPTS: readonly string[] = [
  DISABLE_ANIMATIONS_SCRIPT,
  DISMISS_OVERLAYS_SCRIPT,
  SUPPRESS_UNHANDLED_REJECTIONS_SCRIPT,
  VIEWPORT_META_SCRIPT,
];
