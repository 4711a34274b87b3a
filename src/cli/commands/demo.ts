import { z } from "zod";
import { V } from "../../V";
import { Value } from "../../Value";
import type { Logger } from "../logger";

export const demoSchema = z.object({});

export type DemoArgs = z.infer<typeof demoSchema>;

export interface ReferenceGraph {
  a: Value;
  b: Value;
  c: Value;
  d: Value;
  e: Value;
  f: Value;
  g: Value;
}

/**
 * Sanity-check expression. Reuses c and d on both sides of
 * several updates, so a correct backward pass must accumulate over every path.
 */
export function buildReferenceExpression(): ReferenceGraph {
  const a = V.W(-4.0, 'a');
  const b = V.W(2.0, 'b');
  let c = a.add(b);
  let d = a.mul(b).add(b.pow(3));
  c = c.add(c.add(1));
  c = c.add(V.add(1, c).add(a.neg()));
  d = d.add(d.mul(2).add(b.add(a).relu()));
  d = d.add(V.mul(3, d).add(b.sub(a).relu()));
  const e = c.sub(d);
  const f = e.pow(2);
  let g = f.div(2.0);
  g = g.add(V.div(10.0, f));
  return { a, b, c, d, e, f, g };
}

export function runDemo(_args: DemoArgs, logger: Logger): ReferenceGraph {
  const graph = buildReferenceExpression();
  graph.g.backward();
  logger.info(`g = ${graph.g.data.toFixed(4)}`);
  logger.info(`dg/da = ${graph.a.grad.toFixed(4)}`);
  logger.info(`dg/db = ${graph.b.grad.toFixed(4)}`);
  return graph;
}
