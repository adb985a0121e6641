import type { ButtonHTMLAttributes, CSSProperties, ReactNode } from "react";
import { Link } from "react-router-dom";
import { buttonTokens as T, type ButtonSize, type ButtonVariant } from "@/styles/theme";

export type ButtonProps = {
  children: ReactNode;
  variant?: ButtonVariant;
  size?: ButtonSize;
  /** Disables the button and swaps the label for an ellipsis. */
  loading?: boolean;
  /** Selected state for the "tab" variant. */
  active?: boolean;
  fullWidth?: boolean;
  type?: "button" | "submit";
} & Omit<ButtonHTMLAttributes<HTMLButtonElement>, "children" | "type">;

const variantStyles: Record<ButtonVariant, (active: boolean) => CSSProperties> = {
  primary: () => ({ background: T.colors.accent, color: "#ffffff" }),
  secondary: () => ({ background: T.colors.surface, color: T.colors.text, border: T.border }),
  ghost: () => ({ background: "transparent", color: T.colors.text, boxShadow: "none" }),
  danger: () => ({ background: T.colors.dangerTint, color: T.colors.danger, border: `1px solid ${T.colors.danger}` }),
  tab: (active) =>
    active
      ? { background: T.colors.surface, color: T.colors.text, border: T.border }
      : { background: T.colors.tabIdle, color: T.colors.muted, border: "1px solid transparent", boxShadow: "none" },
};

function buttonStyle(variant: ButtonVariant, size: ButtonSize, active: boolean, inactive: boolean): CSSProperties {
  const s = T.sizes[size];
  return {
    display: "inline-flex",
    alignItems: "center",
    justifyContent: "center",
    gap: 8,
    minHeight: s.minHeight,
    paddingInline: s.paddingX,
    fontSize: s.fontSize,
    fontFamily: T.font.family,
    fontWeight: T.font.weight,
    letterSpacing: T.font.letterSpacing,
    borderRadius: T.radius,
    border: "none",
    boxShadow: inactive ? "none" : T.shadow,
    cursor: inactive ? "default" : "pointer",
    opacity: inactive ? 0.65 : 1,
    transition: "background 0.2s, box-shadow 0.2s, opacity 0.2s",
    ...variantStyles[variant](active),
  };
}

export function Button({
  children,
  variant = "secondary",
  size = "md",
  loading = false,
  active = false,
  fullWidth = false,
  type = "button",
  disabled = false,
  className,
  style,
  ...rest
}: ButtonProps) {
  const inactive = disabled || loading;
  return (
    <button
      type={type}
      className={className ? `ui-button ${className}` : "ui-button"}
      style={{ ...buttonStyle(variant, size, active, inactive), ...(fullWidth ? { width: "100%" } : null), ...style }}
      disabled={inactive}
      aria-pressed={variant === "tab" ? active : undefined}
      {...rest}
    >
      {loading ? <span aria-hidden>…</span> : children}
    </button>
  );
}

/** Square button around an icon; needs an aria-label. */
export function IconButton({ style, ...props }: ButtonProps & { "aria-label": string }) {
  const side = T.icon.touchTarget;
  return <Button {...props} style={{ minWidth: side, minHeight: side, paddingInline: 0, ...style }} />;
}

export type LinkButtonProps = {
  to: string;
  children: ReactNode;
  variant?: ButtonVariant;
  size?: ButtonSize;
  /** Marks the link as the current page. */
  active?: boolean;
  className?: string;
  style?: CSSProperties;
};

/** Navigation styled as a button: a single anchor, never a button inside a link. */
export function LinkButton({ to, children, variant = "secondary", size = "md", active = false, className, style }: LinkButtonProps) {
  return (
    <Link
      to={to}
      className={className ? `ui-button ${className}` : "ui-button"}
      style={{ ...buttonStyle(variant, size, active, false), textDecoration: "none", ...style }}
      aria-current={active ? "page" : undefined}
    >
      {children}
    </Link>
  );
}
