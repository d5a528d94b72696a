export * from "./types";
export { toNumberSet } from "./numbers";
export { generateDraw } from "./draw";
export { classify, scoreDraw, tierFor } from "./classifier";
export { JACKPOT_ODDS, combinations, equivalentYears } from "./odds";
