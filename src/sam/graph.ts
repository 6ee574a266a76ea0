import fs from 'fs';
import path from 'path';
import * as protobuf from 'protobufjs';
import { z } from 'zod';

export const ONNX_PROTO_PATH = path.join(__dirname, '../../proto/onnx.proto');

const GraphSchema = z.object({
  producerName: z.string(),
  graph: z
    .object({
      node: z.array(z.object({ name: z.string(), opType: z.string() })),
    })
    .nullable(),
});

export type GraphSummary = {
  producerName: string;
  nodes: { name: string; opType: string }[];
};

export async function loadModelType(): Promise<protobuf.Type> {
  const root = await protobuf.load(ONNX_PROTO_PATH);
  return root.lookupType('onnx.ModelProto');
}

export async function readGraph(modelFile: string): Promise<GraphSummary> {
  const modelProto = await loadModelType();
  const decoded = modelProto.decode(fs.readFileSync(modelFile));
  const plain = GraphSchema.parse(
    modelProto.toObject(decoded, { defaults: true, arrays: true, objects: true }),
  );
  return { producerName: plain.producerName, nodes: plain.graph?.node ?? [] };
}

function startsWithAny(value: string, prefixes: string[]): boolean {
  return prefixes.some(prefix => value.startsWith(prefix));
}

/**
 * True when the first nodes of the graph already subtract the pixel mean and scale,
 * so the caller must feed raw 0-255 pixels.
 */
export function normalizesInGraph(nodes: GraphSummary['nodes']): boolean {
  let findSub = false;
  let findScale = false;

  for (const [nid, node] of nodes.slice(0, 8).entries()) {
    if (node.opType === 'Sub' || startsWithAny(node.name, ['Sub', '_minus'])) {
      findSub = true;
    }
    if (node.opType === 'Div' || node.opType === 'Mul' || startsWithAny(node.name, ['Div', 'Mul', '_mul'])) {
      findScale = true;
    }
    if (nid < 3 && node.name === 'bn_data') {
      findSub = true;
      findScale = true;
    }
  }

  return findSub && findScale;
}
