export {
  ANSI,
  TerminalServiceTag,
  TerminalServiceLive,
  makeCapturingTerminal,
  formatStatusLine,
  printStatusLine,
  resolveLineStyle,
  makeStatusRenderer,
} from "./TerminalUIService"
export type { TerminalService, StatusRenderer, LineStyle, RendererOptions } from "./TerminalUIService"
