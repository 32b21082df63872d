import React from "react";
import { Box, Text } from "ink";
import { APP_NAME, APP_VERSION } from "../../config.js";
import { SCREENS, SCREEN_TITLES, type Screen } from "../../session/state.js";
import { HEADER_ROWS } from "../layout.js";
import type { Theme } from "../theme.js";

export function formatTabs(screen: Screen, theme: Theme): string {
  return SCREENS.map((tab) =>
    tab === screen ? theme.selectedTab(SCREEN_TITLES[tab]) : theme.accent(SCREEN_TITLES[tab])
  ).join(theme.dim(" | "));
}

export interface HeaderProps {
  screen: Screen;
  theme: Theme;
}

export const Header: React.FC<HeaderProps> = ({ screen, theme }) => (
  <Box borderStyle="single" borderColor={theme.border} height={HEADER_ROWS} flexShrink={0} paddingX={1}>
    <Box flexGrow={1}>
      <Text wrap="truncate-end">{formatTabs(screen, theme)}</Text>
    </Box>
    <Box flexShrink={0} marginLeft={1}>
      <Text>{theme.bold(`${APP_NAME}-${APP_VERSION}`)}</Text>
    </Box>
  </Box>
);
