import React from "react";
import { Box, Text } from "ink";
import { selectedEnvVar, splitEnvValue } from "../../session/state.js";
import { printable, scrollOffset } from "../layout.js";
import type { TraceScreenProps } from "./TraceScreen.js";
import { Panel, Row } from "./Panel.js";

const NAME_ROWS = 3;

export const VarsScreen: React.FC<TraceScreenProps> = ({ session, columns, height, theme }) => {
  const { vars } = session;
  const listWidth = Math.max(16, Math.floor(columns / 3));
  const listRows = height - 3;
  const first = scrollOffset(vars.vars.length, vars.selectedVar, listRows);
  const current = selectedEnvVar(vars);

  const detailHeight = height - NAME_ROWS;
  const detailRows = detailHeight - 3;
  let detail: React.ReactNode = null;
  if (current && vars.detail === "raw") {
    detail = <Text wrap="wrap">{printable(current.value)}</Text>;
  } else if (current) {
    const parts = splitEnvValue(current.value);
    const start = scrollOffset(parts.length, vars.selectedItem, detailRows);
    detail = parts.slice(start, start + detailRows).map((part, i) => {
      const index = start + i;
      const highlight = vars.focus === "detail" && index === vars.selectedItem;
      return <Row key={index}>{highlight ? theme.highlighted(printable(part)) : printable(part)}</Row>;
    });
  }

  return (
    <Box height={height}>
      <Panel title="Variables" width={listWidth} height={height} focused={vars.focus === "list"} theme={theme}>
        {vars.vars.length === 0 ? <Row>{theme.dim("<no variables>")}</Row> : null}
        {vars.vars.slice(first, first + listRows).map(({ name }, i) => (
          <Row key={name}>{first + i === vars.selectedVar ? theme.highlighted(name) : name}</Row>
        ))}
      </Panel>
      <Box flexDirection="column" flexGrow={1}>
        <Panel height={NAME_ROWS} theme={theme}>
          <Row>{current?.name ?? "<No variable selected>"}</Row>
        </Panel>
        <Panel
          title={vars.detail === "raw" ? "[Raw] / Split" : "Raw / [Split]"}
          height={detailHeight}
          focused={vars.focus === "detail"}
          theme={theme}
        >
          {detail}
        </Panel>
      </Box>
    </Box>
  );
};
