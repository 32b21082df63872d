import React from "react";
import { Box, Text } from "ink";
import type { ExitOption } from "../../session/state.js";
import type { Theme } from "../theme.js";

const MODAL_WIDTH = 30;
const BUTTON_WIDTH = (MODAL_WIDTH - 2) / 2;

export interface ExitModalProps {
  highlighted: ExitOption;
  height: number;
  theme: Theme;
}

export const ExitModal: React.FC<ExitModalProps> = ({ highlighted, height, theme }) => {
  const button = (label: string, option: ExitOption): React.ReactNode => (
    <Box width={BUTTON_WIDTH} justifyContent="center">
      <Text>{option === highlighted ? theme.highlighted(label) : theme.fg(label)}</Text>
    </Box>
  );

  return (
    <Box height={height} justifyContent="center" alignItems="center">
      <Box
        borderStyle="single"
        borderColor={theme.border}
        flexDirection="column"
        alignItems="center"
        width={MODAL_WIDTH}
        height={5}
      >
        <Text>{theme.bold("Exit?")}</Text>
        <Text> </Text>
        <Box>
          {button("[   Ok   ]", "ok")}
          {button("[ Cancel ]", "cancel")}
        </Box>
      </Box>
    </Box>
  );
};
