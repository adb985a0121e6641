import type { ReactNode } from "react";
import { buttonTokens } from "@/styles/theme";

interface IconProps {
  size?: number;
  color?: string;
}

function SvgIcon({ size = buttonTokens.icon.size, color = "currentColor", children }: IconProps & { children: ReactNode }) {
  return (
    <svg
      width={size}
      height={size}
      viewBox="0 0 24 24"
      fill="none"
      stroke={color}
      strokeWidth={buttonTokens.icon.strokeWidth}
      strokeLinecap="round"
      strokeLinejoin="round"
      aria-hidden
      style={{ display: "block", flexShrink: 0 }}
    >
      {children}
    </svg>
  );
}

export const DownloadIcon = (props: IconProps) => (
  <SvgIcon {...props}>
    <path d="M21 15v4a2 2 0 01-2 2H5a2 2 0 01-2-2v-4" />
    <path d="M7 10l5 5 5-5M12 15V3" />
  </SvgIcon>
);

export const TrashIcon = (props: IconProps) => (
  <SvgIcon {...props}>
    <path d="M3 6h18M19 6l-1 14a2 2 0 0 1-2 2H8a2 2 0 0 1-2-2L5 6" />
    <path d="M10 11v6M14 11v6M9 6V4a1 1 0 0 1 1-1h4a1 1 0 0 1 1 1v2" />
  </SvgIcon>
);

export const ChevronLeftIcon = ({ color = buttonTokens.colors.muted, ...props }: IconProps) => (
  <SvgIcon color={color} {...props}>
    <path d="m15 18-6-6 6-6" />
  </SvgIcon>
);

export const ChevronRightIcon = ({ color = buttonTokens.colors.muted, ...props }: IconProps) => (
  <SvgIcon color={color} {...props}>
    <path d="m9 18 6-6-6-6" />
  </SvgIcon>
);
