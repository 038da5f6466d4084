#!/usr/bin/env node

// Dispatcher script for running different examples
// Usage:
//   npm run example                    - Run the default report
//   npm run example -- [type] [args]   - Run a specific example
//
// Types:
//   report      Histogram, CDF and thresholds for one csp/tau pair
//   sweep       CSV of thresholds over a range of tau
//   list        Show detailed descriptions

const arg = process.argv[2];

async function runExample(modulePath: string, message: string) {
  console.log(`${message}\n`);
  await import(modulePath);
}

function showList() {
  console.log("Available Examples:\n");
  console.log("  report [csp] [tau] [grinding]");
  console.log(
    "                Propagates the split process and prints the pnode histogram, CDF and thresholds\n"
  );
  console.log("  sweep [csp] [tauFrom] [tauTo] [grinding]");
  console.log(
    "                Prints CSV rows with the pnode count reached with probability 1/8, 1/4 and 1/2\n"
  );

  console.log("Usage:");
  console.log("  npm run example                    - Run the default report");
  console.log("  npm run example -- [type] [args]   - Run a specific example\n");
}

async function main() {
  switch (arg) {
    case "report":
      await runExample("./report", "Running report...");
      break;

    case "sweep":
      await runExample("./sweep", "Running parameter sweep...");
      break;

    case "list":
      showList();
      break;

    case undefined:
      await runExample("./report", "Running report (default)...");
      break;

    default:
      console.error(`Unknown example type: ${arg}\n`);
      showList();
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
