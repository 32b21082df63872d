import React from "react";
import { Box, Text } from "ink";
import type { Theme } from "../theme.js";

export interface PanelProps {
  title?: string;
  /** Outer width; the panel grows to fill its row when unset */
  width?: number;
  height: number;
  focused?: boolean;
  theme: Theme;
  children?: React.ReactNode;
}

/**
 * Bordered panel with an optional bold title row
 */
export const Panel: React.FC<PanelProps> = ({ title, width, height, focused = false, theme, children }) => (
  <Box
    borderStyle="single"
    borderColor={focused ? theme.border : undefined}
    flexDirection="column"
    width={width}
    height={height}
    flexGrow={width === undefined ? 1 : 0}
    flexShrink={0}
    overflow="hidden"
    paddingX={1}
  >
    {title ? <Text wrap="truncate-end">{theme.bold(title)}</Text> : null}
    {children}
  </Box>
);

export interface RowProps {
  children?: React.ReactNode;
}

/** One line of panel content, cut at the panel's edge */
export const Row: React.FC<RowProps> = ({ children }) => <Text wrap="truncate-end">{children}</Text>;
