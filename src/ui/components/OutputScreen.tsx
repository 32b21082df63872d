import React from "react";
import { Box } from "ink";
import { printable } from "../layout.js";
import type { ScreenProps } from "./HomeScreen.js";
import { Panel, Row } from "./Panel.js";

export const OutputScreen: React.FC<ScreenProps> = ({ session, height, theme }) => {
  const code = session.resumeCode.replace(/\n$/, "");
  return (
    <Box flexDirection="column" height={height}>
      <Box height={2} paddingX={1} flexShrink={0}>
        <Row>These commands will be evaluated by your shell when the script continues.</Row>
      </Box>
      <Panel title="Output" height={height - 2} theme={theme}>
        {code ? (
          code.split("\n").map((line, i) => <Row key={i}>{printable(line)}</Row>)
        ) : (
          <Row>{theme.dim("<nothing: the script continues unchanged>")}</Row>
        )}
      </Panel>
    </Box>
  );
};
