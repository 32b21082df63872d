import React from "react";
import { Box, Text } from "ink";
import { APP_NAME } from "../../config.js";
import type { Session } from "../../session/state.js";
import { describeTraceMode } from "../../session/trace-mode.js";
import type { Theme } from "../theme.js";
import { Panel, Row } from "./Panel.js";

export interface ScreenProps {
  session: Session;
  height: number;
  theme: Theme;
}

export const HomeScreen: React.FC<ScreenProps> = ({ session, height, theme }) => {
  const location = session.callStack[0];
  return (
    <Panel height={height} theme={theme}>
      <Box flexDirection="column" alignItems="center" marginY={1}>
        <Text>{theme.bold(theme.accent(APP_NAME))}</Text>
        <Text wrap="truncate-end">Debug a shell script paused at a tracepoint</Text>
      </Box>
      <Row>
        {"Tracepoint: "}
        {theme.bold(session.tracepoint)}
        {theme.dim(` (${session.shell})`)}
      </Row>
      <Row>
        {"Location:   "}
        {location ? `${location.file}:${location.line}` : "<top level>"}
      </Row>
      <Row>
        {"Mode:       "}
        {describeTraceMode(session.mode)}
        {theme.dim("  →  after continuing: ")}
        {describeTraceMode(session.after)}
      </Row>
      <Text> </Text>
      <Row>The debugger has capabilities separated out into different tabs:</Row>
      <Row>- Home: you are here</Row>
      <Row>- Trace: see the call stack and the code around each call site</Row>
      <Row>- Vars: inspect the environment the script is running with</Row>
      <Row>- Output: see the commands your shell evaluates when the script continues</Row>
    </Panel>
  );
};
