/**
 * Terminal text styling for CLI output. `Fmt.from(isTTY)` picks SGR escapes
 * or plain text.
 */
import {StaticTypeCompanion} from "./companion.js";

export interface Fmt {
  dim(text: string): string
  bold(text: string): string
  red(text: string): string
  green(text: string): string
}

const sgr = (code: number) => (text: string) => `\x1b[${code}m${text}\x1b[0m`
const plain = (text: string) => text

const styled: Fmt = { dim: sgr(2), bold: sgr(1), red: sgr(31), green: sgr(32) }
const unstyled: Fmt = { dim: plain, bold: plain, red: plain, green: plain }

export const Fmt = StaticTypeCompanion({
  noop: unstyled,
  from(color: boolean): Fmt {
    return color ? styled : unstyled
  },
})
