import React from "react";
import { Box, Text } from "ink";
import type { Frame } from "../../trace/frames.js";
import { excerptAround } from "../../trace/source.js";
import { printable, scrollOffset } from "../layout.js";
import type { Theme } from "../theme.js";
import type { ScreenProps } from "./HomeScreen.js";
import { Panel, Row } from "./Panel.js";

const TRACEPOINT_ROWS = 3;
const INFO_ROWS = 6;

interface SourcePanelProps {
  frame: Frame;
  lines: readonly string[] | null | undefined;
  height: number;
  theme: Theme;
}

const SourcePanel: React.FC<SourcePanelProps> = ({ frame, lines, height, theme }) => {
  if (!lines) {
    return (
      <Panel title="Call Site" height={height} theme={theme}>
        <Row>{theme.dim("<source unavailable>")}</Row>
      </Panel>
    );
  }

  // Border and title take three rows
  const excerpt = excerptAround(lines, frame.line, height - 3);
  const numberWidth = String(excerpt.firstLine + excerpt.lines.length - 1).length;
  return (
    <Panel title="Call Site" height={height} theme={theme}>
      {excerpt.lines.map((text, i) => {
        const number = excerpt.firstLine + i;
        const gutter = `${String(number).padStart(numberWidth)} │ `;
        return (
          <Row key={number}>
            {number === frame.line
              ? theme.highlighted(gutter + printable(text))
              : theme.dim(gutter) + printable(text)}
          </Row>
        );
      })}
    </Panel>
  );
};

export interface TraceScreenProps extends ScreenProps {
  columns: number;
}

export const TraceScreen: React.FC<TraceScreenProps> = ({ session, columns, height, theme }) => {
  const stack = session.callStack;
  const stackHeight = height - TRACEPOINT_ROWS;

  const tracepoint = (
    <Panel height={TRACEPOINT_ROWS} theme={theme}>
      <Row>
        {"Current tracepoint: "}
        {theme.bold(session.tracepoint)}
      </Row>
    </Panel>
  );

  if (stack.length === 0) {
    return (
      <Box flexDirection="column" height={height}>
        {tracepoint}
        <Box borderStyle="single" height={stackHeight} justifyContent="center" alignItems="center">
          <Text wrap="truncate-end">{theme.dim("<no callers: tracepoint at top level>")}</Text>
        </Box>
      </Box>
    );
  }

  const selected = Math.min(session.trace.selectedFrame, stack.length - 1);
  const frame = stack[selected];
  const listWidth = Math.max(16, Math.floor(columns * 0.25));
  const listRows = stackHeight - 3;
  const first = scrollOffset(stack.length, selected, listRows);

  return (
    <Box flexDirection="column" height={height}>
      {tracepoint}
      <Box height={stackHeight}>
        <Panel title="Call Stack" width={listWidth} height={stackHeight} theme={theme}>
          {stack.slice(first, first + listRows).map((f, i) => {
            const index = first + i;
            const label = `#${index} ${f.function}`;
            return <Row key={index}>{index === selected ? theme.highlighted(label) : label}</Row>;
          })}
        </Panel>
        <Box flexDirection="column" flexGrow={1}>
          <Panel title="Call Site Info" height={INFO_ROWS} theme={theme}>
            <Row>
              {theme.dim("File: ")}
              {printable(frame.file)}
            </Row>
            <Row>
              {theme.dim("Line: ")}
              {String(frame.line)}
            </Row>
            <Row>
              {theme.dim("Function: ")}
              {frame.function}
            </Row>
          </Panel>
          <SourcePanel
            frame={frame}
            lines={session.sources.get(frame.file)}
            height={stackHeight - INFO_ROWS}
            theme={theme}
          />
        </Box>
      </Box>
    </Box>
  );
};
