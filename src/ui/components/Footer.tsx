import React from "react";
import { Box, Text } from "ink";
import type { KeyHint } from "../keys.js";
import { FOOTER_ROWS } from "../layout.js";
import type { Theme } from "../theme.js";

export function formatHints(hints: readonly KeyHint[], theme: Theme): string {
  return hints
    .map(({ keys, description }) => `${theme.dim("[")}${theme.accent(keys)}${theme.dim(": ")}${theme.fg(description)}${theme.dim("]")}`)
    .join(" ");
}

export interface FooterProps {
  hints: readonly KeyHint[];
  theme: Theme;
}

export const Footer: React.FC<FooterProps> = ({ hints, theme }) => (
  <Box borderStyle="single" height={FOOTER_ROWS} flexShrink={0} justifyContent="center" paddingX={1}>
    <Text wrap="truncate-end">{formatHints(hints, theme)}</Text>
  </Box>
);
