export type { CodePointScript, ScriptInfo } from "./scripts";
export {
  classify,
  classifyCodePoint,
  isBreakPunctuation,
  isCombiningMark,
  isHardBreakCodePoint,
  isWhitespaceCodePoint,
  isoScriptTag,
  requiresComplexShaping,
} from "./scripts";
