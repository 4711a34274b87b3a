import * as fs from "fs";
import { z } from "zod";
import { toDot } from "../../GraphViz";
import { MLP } from "../../nn/MLP";
import { Neuron } from "../../nn/Neuron";
import { seededRandom } from "../../Random";
import { V } from "../../V";
import type { Value } from "../../Value";
import type { Logger } from "../logger";

export const graphSchema = z.object({
  kind: z.enum(["expr", "neuron", "mlp"]).default("expr"),
  out: z.string().min(1).optional(),
  seed: z.number().int().default(1337),
});

export type GraphArgs = z.infer<typeof graphSchema>;

function buildRoot(args: GraphArgs): Value {
  const rng = seededRandom(args.seed);
  switch (args.kind) {
    case "expr": {
      const [a, b, c, d] = [1, 2, 3, 4].map(n => V.C(n));
      return a.add(b).mul(c.add(d)).pow(2);
    }
    case "neuron":
      return new Neuron(1, { rng }).forward([7]);
    case "mlp":
      return new MLP(2, [2, 1], { rng }).forward([7, 8])[0];
  }
}

/**
 * Builds a sample graph, runs backward on it and emits DOT text.
 */
export function runGraph(args: GraphArgs, logger: Logger): string {
  const root = buildRoot(args);
  root.backward();
  const dot = toDot(root);

  if (args.out) {
    fs.writeFileSync(args.out, dot + "\n", "utf-8");
    logger.error(`Output written to ${args.out}`);
  } else {
    logger.info(dot);
  }
  return dot;
}
