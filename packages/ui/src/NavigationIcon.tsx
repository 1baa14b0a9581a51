/**
 * NavigationIcon — decorative outline icon for a navigation item.
 *
 * Icons never carry meaning on their own (the label does), so the
 * wrapper is hidden from assistive technology and the SVG is not
 * focusable. Unknown names render a generic dot instead of failing.
 */

const ICON_PATHS: Record<string, string> = {
  home: "M3 11.5 12 4l9 7.5M5.5 9.5V20h13V9.5M10 20v-5h4v5",
  dashboard: "M4 4h7v7H4zM13 4h7v4h-7zM13 10h7v10h-7zM4 13h7v7H4z",
  users: "M16 19v-1.5a3.5 3.5 0 0 0-3.5-3.5h-5A3.5 3.5 0 0 0 4 17.5V19M10 11a3.5 3.5 0 1 0 0-7 3.5 3.5 0 0 0 0 7M20 19v-1.5a3.5 3.5 0 0 0-2.5-3.36M15 4.14a3.5 3.5 0 0 1 0 6.72",
  inbox: "M4 13h4l2 3h4l2-3h4M4 13l2.5-8h11l2.5 8v6H4z",
  bell: "M18 15V11a6 6 0 0 0-12 0v4l-2 3h16zM10 21h4",
  chart: "M4 20h16M7 16v-5M12 16V7M17 16v-8",
  search: "M11 18a7 7 0 1 0 0-14 7 7 0 0 0 0 14M20 20l-4-4",
  settings: "M12 15a3 3 0 1 0 0-6 3 3 0 0 0 0 6M19.4 15a1.7 1.7 0 0 0 .3 1.8l.1.1a2 2 0 1 1-2.8 2.8l-.1-.1a1.7 1.7 0 0 0-2.9 1.2V21a2 2 0 1 1-4 0v-.1a1.7 1.7 0 0 0-2.9-1.2l-.1.1a2 2 0 1 1-2.8-2.8l.1-.1a1.7 1.7 0 0 0-1.2-2.9H3a2 2 0 1 1 0-4h.1a1.7 1.7 0 0 0 1.2-2.9l-.1-.1a2 2 0 1 1 2.8-2.8l.1.1a1.7 1.7 0 0 0 2.9-1.2V3a2 2 0 1 1 4 0v.1a1.7 1.7 0 0 0 2.9 1.2l.1-.1a2 2 0 1 1 2.8 2.8l-.1.1a1.7 1.7 0 0 0 1.2 2.9H21a2 2 0 1 1 0 4h-.1a1.7 1.7 0 0 0-1.5 1",
  cart: "M3 4h2l2.4 11h10.2L20 8H6.2M9 20a1 1 0 1 0 0-2 1 1 0 0 0 0 2M17 20a1 1 0 1 0 0-2 1 1 0 0 0 0 2",
  book: "M4 5.5A2.5 2.5 0 0 1 6.5 3H20v15H6.5A2.5 2.5 0 0 0 4 20.5zM4 20.5A2.5 2.5 0 0 0 6.5 23H20",
  user: "M12 12a4 4 0 1 0 0-8 4 4 0 0 0 0 8M4 21a8 8 0 0 1 16 0",
};

const FALLBACK_PATH = "M12 14a2 2 0 1 0 0-4 2 2 0 0 0 0 4";

/** Accepts plain names and Heroicons-style names ("heroicon-o-home") */
export function iconPath(name: string): string {
  const key = name.replace(/^heroicon-[a-z]-/, "");
  return ICON_PATHS[key] ?? FALLBACK_PATH;
}

export function NavigationIcon({ name }: { name: string }) {
  return (
    <span className="ndk-nav-icon" aria-hidden="true" data-icon={name}>
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width="24"
        height="24"
        viewBox="0 0 24 24"
        fill="none"
        stroke="currentColor"
        strokeWidth="1.5"
        strokeLinecap="round"
        strokeLinejoin="round"
        focusable="false"
      >
        <path d={iconPath(name)} />
      </svg>
    </span>
  );
}
