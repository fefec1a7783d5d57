export { matchOppositePairs, matchOppositeRecords } from "./oppositePairMatcher";
