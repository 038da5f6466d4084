import {
  SplitCache,
  histogram,
  leafCount,
  openSize,
  propagate,
  vcParams,
} from "../src/index";
import {
  intArg,
  printCDFChart,
  printHistogramChart,
  printSummary,
  printThresholds,
  printTopConfigurations,
  sep,
} from "./print";

// Usage: npm run example -- report [csp] [tau] [grinding]
const csp = intArg(process.argv[3], 128, "csp");
const tau = intArg(process.argv[4], 16, "tau");
const grinding = intArg(process.argv[5], 0, "grinding");

function report() {
  const effective = csp - grinding;
  const { t0, k0, t1, k1 } = vcParams(effective, tau);
  const leaves = leafCount(effective, tau);

  sep(`csp = ${csp}, tau = ${tau}, grinding = ${grinding}`);
  console.log(`t0 = ${t0}, k0 = ${k0}, t1 = ${t1}, k1 = ${k1}`);
  console.log(`L = ${leaves}, max_size = ${openSize(effective, tau)}\n`);

  const cache = new SplitCache();
  const started = performance.now();
  const dist = propagate(leaves, tau, {
    cache,
    onStep: ({ step, steps, distribution, cacheSize }) =>
      console.log(
        `step ${step}/${steps}: ${distribution.size} configurations, ${cacheSize} cached sizes`
      ),
  });
  const elapsed = performance.now() - started;
  console.log(`\ndone in ${elapsed.toFixed(1)} ms (${cache.hits} cache hits, ${cache.misses} misses)\n`);

  const hist = histogram(dist);
  printSummary("Summary", hist, [
    ["Leaves:", String(leaves)],
    ["Configurations:", String(dist.size)],
  ]);
  printHistogramChart(hist, `tau = ${tau}`);
  printCDFChart(hist, `tau = ${tau}`);
  printThresholds(hist);
  printTopConfigurations(dist);
}

report();
