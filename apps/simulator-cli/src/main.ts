import { isLottoError, lottoErrorPayload } from "@toto-sim/core-errors";
import { loadSimulatorConfig } from "@toto-sim/core-config";
import { PinoLogger } from "@toto-sim/core-logging";
import { ProvablyFairService } from "@toto-sim/core-provably-fair";
import { ProvablyFairRngService } from "@toto-sim/core-rng";
import { toNumberSet } from "@toto-sim/game-math-toto";
import { PROGRESS_STEPS } from "@toto-sim/toto-simulation";
import { COMMANDS, DrawOptions, SimulateOptions, isCommand, parseArgs, toDrawOptions, toSimulateOptions } from "./args";
import { renderProgressBar, toDrawReport, toSimulationReport } from "./report";
import { createSession } from "./session";

const USAGE = [
  `Available commands: ${COMMANDS.join(", ")}`,
  "Example: npm run simulator -- draw --numbers 1,2,3,4,5,6",
  "Example: npm run simulator -- simulate --numbers 1,2,3,4,5,6 --max-draws 1000000 --seed test-seed",
];

const pf = new ProvablyFairService();
const rngService = new ProvablyFairRngService(pf);
// stdout carries the JSON report; diagnostics go to stderr.
const logger = new PinoLogger({ destination: 2 });

// ============ Main Function ============
async function main() {
  const [, , command, ...rest] = process.argv;
  if (!isCommand(command)) {
    if (command) {
      console.error(`Unsupported command: ${command}`);
    }
    USAGE.forEach((line) => console.error(line));
    process.exitCode = 1;
    return;
  }

  const config = loadSimulatorConfig();
  const args = parseArgs(rest);

  switch (command) {
    case "draw":
      runDraw(toDrawOptions(args));
      break;
    case "simulate":
      runSimulation(toSimulateOptions(args, config.defaultMaxDraws));
      break;
  }
}

// ============ Commands ============
function runDraw(options: DrawOptions) {
  const numbers = toNumberSet(options.numbers);
  const { engine, pf: pfInfo } = createSession(options, { provablyFair: pf, rng: rngService, logger });
  const result = engine.runOnce(numbers);
  console.log(JSON.stringify(toDrawReport(numbers, result, pfInfo), null, 2));
}

function runSimulation(options: SimulateOptions) {
  const numbers = toNumberSet(options.numbers);
  const { engine, pf: pfInfo } = createSession(options, { provablyFair: pf, rng: rngService, logger });

  process.stderr.write(`Simulating up to ${options.maxDraws.toLocaleString("en-US")} draws...\n`);
  process.stderr.write(`${renderProgressBar({ step: 0, steps: PROGRESS_STEPS })}\r`);
  const summary = engine.runUntilJackpot(numbers, options.maxDraws, {
    onProgress: (progress) => process.stderr.write(`${renderProgressBar(progress)}\r`),
  });
  process.stderr.write("\n");

  console.log(JSON.stringify(toSimulationReport(numbers, summary, pfInfo), null, 2));
}

main().catch((err: unknown) => {
  if (isLottoError(err)) {
    console.error(JSON.stringify(lottoErrorPayload(err.code, err.message, err.details), null, 2));
  } else {
    logger.error("simulator.failed", { err: err instanceof Error ? err.stack ?? err.message : String(err) });
  }
  process.exitCode = 1;
});
