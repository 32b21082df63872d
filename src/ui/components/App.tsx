import React, { useRef, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import type { Logger } from "../../logger.js";
import { reduce } from "../../session/reducer.js";
import type { ExitDecision, Session } from "../../session/state.js";
import { keyPressFromInk, type KeyBindings } from "../keys.js";
import { FOOTER_ROWS, HEADER_ROWS, MIN_COLUMNS, MIN_ROWS, isTooSmall } from "../layout.js";
import type { Theme } from "../theme.js";
import { ExitModal } from "./ExitModal.js";
import { Footer } from "./Footer.js";
import { Header } from "./Header.js";
import { HomeScreen } from "./HomeScreen.js";
import { OutputScreen } from "./OutputScreen.js";
import { TraceScreen } from "./TraceScreen.js";
import { useScreenSize } from "./useScreenSize.js";
import { VarsScreen } from "./VarsScreen.js";

export interface SessionResult {
  session: Session;
  decision: ExitDecision;
}

export interface AppProps {
  initial: Session;
  bindings: KeyBindings;
  theme: Theme;
  onExit: (result: SessionResult) => void;
  logger?: Logger;
}

/**
 * The debugger TUI. Keys go through the bindings' router and the reducer;
 * the first exit decision is reported once and ends input handling.
 */
export const App: React.FC<AppProps> = ({ initial, bindings, theme, onExit, logger }) => {
  const { exit } = useApp();
  const size = useScreenSize();
  const [session, setSession] = useState(initial);
  // Keys can arrive faster than React re-renders
  const current = useRef(initial);
  const finished = useRef(false);

  useInput((input, key) => {
    if (finished.current) return;
    const press = keyPressFromInk(input, key);
    const event = press ? bindings.route(current.current, press) : null;
    if (!press || !event) return;

    logger?.debug({ key: press.name, event }, "event");
    const transition = reduce(current.current, event);
    current.current = transition.session;
    setSession(transition.session);
    if (transition.exit) {
      finished.current = true;
      onExit({ session: transition.session, decision: transition.exit });
      exit();
    }
  });

  const { columns, rows } = size;
  if (isTooSmall(size)) {
    return (
      <Box width={columns} height={rows} justifyContent="center" alignItems="center">
        <Text wrap="truncate-end">
          {theme.error(`Terminal too small (${columns}x${rows}), need ${MIN_COLUMNS}x${MIN_ROWS}`)}
        </Text>
      </Box>
    );
  }

  const height = rows - HEADER_ROWS - FOOTER_ROWS;
  let body: React.ReactNode;
  if (session.exitState.kind === "present-modal") {
    body = <ExitModal highlighted={session.exitState.highlighted} height={height} theme={theme} />;
  } else {
    switch (session.screen) {
      case "home":
        body = <HomeScreen session={session} height={height} theme={theme} />;
        break;
      case "trace":
        body = <TraceScreen session={session} columns={columns} height={height} theme={theme} />;
        break;
      case "vars":
        body = <VarsScreen session={session} columns={columns} height={height} theme={theme} />;
        break;
      case "output":
        body = <OutputScreen session={session} height={height} theme={theme} />;
        break;
    }
  }

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <Header screen={session.screen} theme={theme} />
      {body}
      <Footer hints={bindings.keymap(session.screen, session.exitState).hints()} theme={theme} />
    </Box>
  );
};
