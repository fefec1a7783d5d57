export { runPairing, pairSheet } from "./runPairing";
export { validatePairingOptions, collectOptionProblems } from "./validateOptions";
