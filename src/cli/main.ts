/**
 * dagrad - run the reference expression, train a small MLP, or export a graph as DOT.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { CliError, parseArgs } from "./cli-error";
import { demoSchema, runDemo } from "./commands/demo";
import { graphSchema, runGraph } from "./commands/graph";
import { runTrain, trainSchema } from "./commands/train";
import { consoleLogger, type Logger } from "./logger";

const terminalWidth = typeof process.stdout.columns === "number" ? process.stdout.columns : 120;

export function main(args: string[] = hideBin(process.argv), logger: Logger = consoleLogger): void {
  yargs(args)
    .scriptName("dagrad")
    .usage("$0 <command> [options]")
    .strict()
    .demandCommand(1, "Specify a command.")
    .command(
      "demo",
      "Evaluate the reference expression and print g, dg/da and dg/db.",
      cmd => cmd,
      argv => {
        runDemo(parseArgs(demoSchema, argv), logger);
      }
    )
    .command(
      "train",
      "Train an MLP binary classifier with max-margin loss and SGD.",
      cmd => cmd
        .option("data", { type: "string", describe: "CSV file with an x,y,label header; generated moons when omitted." })
        .option("samples", { type: "number", describe: "Number of generated samples.", default: 100 })
        .option("noise", { type: "number", describe: "Gaussian noise of generated samples.", default: 0.1 })
        .option("steps", { type: "number", describe: "SGD steps.", default: 100 })
        .option("hidden", { type: "string", describe: "Hidden layer sizes, comma-separated.", default: "16,16" })
        .option("alpha", { type: "number", describe: "L2 regularization strength.", default: 1e-4 })
        .option("seed", { type: "number", describe: "Seed for weights and generated data.", default: 1337 })
        .option("plot", { type: "boolean", describe: "Print an ASCII plot of the decision boundary.", default: false }),
      argv => {
        runTrain(parseArgs(trainSchema, argv), logger);
      }
    )
    .command(
      "graph",
      "Run backward on a sample graph and emit Graphviz DOT.",
      cmd => cmd
        .option("kind", { type: "string", choices: ["expr", "neuron", "mlp"], default: "expr" })
        .option("out", { type: "string", describe: "Output file (default: stdout)." })
        .option("seed", { type: "number", describe: "Seed for neuron weights.", default: 1337 }),
      argv => {
        runGraph(parseArgs(graphSchema, argv), logger);
      }
    )
    .fail((msg, err, instance) => {
      if (err instanceof CliError) {
        logger.error(err.message);
        if (process.env.DEBUG) logger.error(err.stack ?? "");
        process.exit(err.exitCode);
      }
      if (msg) {
        logger.error(msg);
      }
      if (err) {
        logger.error(err.message);
        if (process.env.DEBUG) logger.error(err.stack ?? "");
      }
      instance.showHelp(s => logger.error(s));
      process.exit(1);
    })
    .help()
    .wrap(Math.min(terminalWidth, 120))
    .parse();
}
