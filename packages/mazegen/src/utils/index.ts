export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  printMaze,
  type RenderOptions,
  renderAscii,
  SIMPLE_CHARSET,
} from "./ascii-renderer";
export { type DOTOptions, renderDOT } from "./dot-renderer";
export {
  DARK_PALETTE,
  LIGHT_PALETTE,
  renderSVG,
  type SVGColorPalette,
  type SVGOptions,
} from "./svg-renderer";
