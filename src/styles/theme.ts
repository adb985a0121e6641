/**
 * Button tokens. Colors point at the CSS variables in index.css where one exists.
 */
export type ButtonSize = "sm" | "md";
export type ButtonVariant = "primary" | "secondary" | "ghost" | "danger" | "tab";

export const buttonTokens = {
  radius: 999,
  border: "1px solid var(--border, rgba(0,0,0,0.1))",
  shadow: "0 2px 12px rgba(40, 60, 80, 0.06)",
  font: {
    family: "var(--font-sans)",
    weight: 600,
    letterSpacing: "-0.01em",
  },
  sizes: {
    sm: { minHeight: 36, paddingX: 14, fontSize: 13 },
    md: { minHeight: 44, paddingX: 18, fontSize: 14 },
  },
  icon: {
    size: 18,
    strokeWidth: 1.5,
    touchTarget: 40,
  },
  colors: {
    text: "#1F2A33",
    muted: "var(--text-muted)",
    surface: "#FFFFFF",
    accent: "var(--accent)",
    danger: "#C63B3B",
    dangerTint: "rgba(198,59,59,0.10)",
    tabIdle: "rgba(40, 60, 80, 0.06)",
  },
} as const;
