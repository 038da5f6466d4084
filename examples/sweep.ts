import { openSubtreeHistogram } from "../src/index";
import { THRESHOLD_LEVELS, intArg } from "./print";

// Usage: npm run example -- sweep [csp] [tauFrom] [tauTo] [grinding]
// Prints one CSV row per tau with the open-subtree thresholds at 1/8, 1/4 and 1/2.
const csp = intArg(process.argv[3], 64, "csp");
const tauFrom = intArg(process.argv[4], 4, "tauFrom");
const tauTo = intArg(process.argv[5], tauFrom + 4, "tauTo");
const grinding = intArg(process.argv[6], 0, "grinding");

console.log("lambda,tau,t_open_1_8,t_open_1_4,t_open_1_2");
for (let tau = Math.max(1, tauFrom); tau <= tauTo; tau++) {
  const hist = openSubtreeHistogram(csp, tau, { grinding });
  console.log([csp, tau, ...hist.thresholds(THRESHOLD_LEVELS)].join(","));
}
