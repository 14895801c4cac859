import React, { useEffect } from "react";
import { Box, Text, render, useApp } from "ink";

import type { TerminationStatus } from "../protocol/messages.js";

export type ConclusionView = {
  status: TerminationStatus;
  reason: string;
  totalTurns: number;
  text: string;
};

const STATUS_COLOR: Record<TerminationStatus, string> = {
  ONGOING: "blue",
  DEAL_ACCEPTED: "green",
  DEAL_DECLINED: "yellow",
  IMPASSE: "yellow",
  MAX_TURNS_REACHED: "blue",
  PARTY_DISCONNECTED: "red"
};

const ConclusionPanel = ({ view }: { view: ConclusionView }): React.ReactElement => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  return React.createElement(
    Box,
    { flexDirection: "column", borderStyle: "round", paddingX: 1 },
    React.createElement(Text, { bold: true }, "NEGOTIATION CONCLUDED"),
    React.createElement(
      Text,
      null,
      "Outcome: ",
      React.createElement(Text, { color: STATUS_COLOR[view.status], bold: true }, view.status)
    ),
    React.createElement(Text, null, `Reason: ${view.reason}`),
    React.createElement(Text, null, `Total turns: ${view.totalTurns}`),
    React.createElement(Box, { marginTop: 1 }, React.createElement(Text, null, view.text))
  );
};

/** Plain rendering for non-TTY output and log capture. */
export const formatConclusionText = (view: ConclusionView): string =>
  [
    "NEGOTIATION CONCLUDED",
    `Outcome: ${view.status}`,
    `Reason: ${view.reason}`,
    `Total turns: ${view.totalTurns}`,
    "",
    view.text
  ].join("\n");

export const renderConclusionInk = async (view: ConclusionView): Promise<void> => {
  const { waitUntilExit } = render(React.createElement(ConclusionPanel, { view }));
  await waitUntilExit();
};
