import React from "react"
import { Box, Text } from "ink"
import type { Mode } from "../../browser/mode.js"
import type { ListingRow } from "../../browser/types.js"
import { KEY_HINT } from "../../session/keymap.js"
import { COLORS, GLYPHS, paintRow } from "../theme.js"

export interface BrowserViewProps {
  readonly paneCount: number
  readonly activeIndex: number
  readonly directory: string
  readonly rows: ReadonlyArray<ListingRow>
  readonly mode: Mode
  readonly status: string | null
}

const PaneTabs = ({ paneCount, activeIndex }: { paneCount: number; activeIndex: number }) => (
  <Box>
    {Array.from({ length: paneCount }, (_, index) => (
      <Text key={`pane-${index}`} inverse={index === activeIndex} color={index === activeIndex ? COLORS.activeTab : COLORS.muted}>
        {` ${index + 1} `}
      </Text>
    ))}
  </Box>
)

const Footer = ({ mode, status }: { mode: Mode; status: string | null }) => {
  if (mode.kind === "command") {
    return <Text>{`${GLYPHS.prompt}${mode.buffer}`}</Text>
  }
  if (status) {
    return <Text color={COLORS.error}>{status}</Text>
  }
  return (
    <Text color={COLORS.muted} wrap="truncate">
      {KEY_HINT}
    </Text>
  )
}

export const BrowserView = ({ paneCount, activeIndex, directory, rows, mode, status }: BrowserViewProps) => (
  <Box flexDirection="column">
    <Box>
      <PaneTabs paneCount={paneCount} activeIndex={activeIndex} />
      <Text color={COLORS.muted}>{` ${GLYPHS.separator} `}</Text>
      <Text color={COLORS.title} wrap="truncate-start">
        {directory}
      </Text>
    </Box>
    <Box flexDirection="column">
      {rows.length === 0 ? (
        <Text color={COLORS.muted}>(empty)</Text>
      ) : (
        rows.map((row, index) => (
          <Text key={`row-${index}`} wrap="truncate">
            {paintRow(row.segments)}
          </Text>
        ))
      )}
    </Box>
    <Footer mode={mode} status={status} />
  </Box>
)
