import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { logger as rootLogger, type Logger } from '../../logger';

export type Activation = 'sigmoid' | 'tanh' | 'relu' | 'linear';

export type DenseLayer = Readonly<{
  inputs: number;
  outputs: number;
  weights: ReadonlyArray<ReadonlyArray<number>>;
  biases: ReadonlyArray<number>;
  activation: Activation;
}>;

export type NeuralNetwork = Readonly<{
  id: string;
  inputSize: number;
  outputSize: number;
  layers: ReadonlyArray<DenseLayer>;
}>;

export class NetworkLoadError extends Error {
  readonly networkId: string;

  constructor(networkId: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load network "${networkId}": ${message}`, options);
    this.name = 'NetworkLoadError';
    this.networkId = networkId;
  }
}

const layerSchema = z.object({
  inputs: z.number().int().positive(),
  outputs: z.number().int().positive(),
  weights: z.array(z.array(z.number().finite())),
  biases: z.array(z.number().finite()),
  activation: z.enum(['sigmoid', 'tanh', 'relu', 'linear']).default('sigmoid')
});

const networkSchema = z.object({
  id: z.string().min(1).optional(),
  layers: z.array(layerSchema).min(1)
});

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

const freezeLayer = (layer: z.infer<typeof layerSchema>): DenseLayer =>
  Object.freeze({
    inputs: layer.inputs,
    outputs: layer.outputs,
    weights: Object.freeze(layer.weights.map((row) => Object.freeze([...row]))),
    biases: Object.freeze([...layer.biases]),
    activation: layer.activation
  });

/**
 * Parses a serialized weight document. Layers must chain: each layer's `inputs` equals the
 * previous layer's `outputs`, and `weights` is `outputs` rows of `inputs` columns.
 */
export const loadNetwork = (serialized: string, fallbackId = 'anonymous'): NeuralNetwork => {
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (error) {
    throw new NetworkLoadError(fallbackId, 'weight file is not valid JSON', { cause: error });
  }

  const parsed = networkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NetworkLoadError(fallbackId, formatIssues(parsed.error));
  }

  const id = parsed.data.id ?? fallbackId;
  const layers = parsed.data.layers;

  layers.forEach((layer, index) => {
    if (layer.weights.length !== layer.outputs) {
      throw new NetworkLoadError(id, `layer ${index} has ${layer.weights.length} weight rows, expected ${layer.outputs}`);
    }
    const badRow = layer.weights.findIndex((row) => row.length !== layer.inputs);
    if (badRow >= 0) {
      throw new NetworkLoadError(id, `layer ${index} row ${badRow} has ${layer.weights[badRow].length} weights, expected ${layer.inputs}`);
    }
    if (layer.biases.length !== layer.outputs) {
      throw new NetworkLoadError(id, `layer ${index} has ${layer.biases.length} biases, expected ${layer.outputs}`);
    }
    const previous = layers[index - 1];
    if (previous && previous.outputs !== layer.inputs) {
      throw new NetworkLoadError(id, `layer ${index} takes ${layer.inputs} inputs but layer ${index - 1} emits ${previous.outputs}`);
    }
  });

  const frozen = layers.map(freezeLayer);
  return Object.freeze({
    id,
    inputSize: frozen[0].inputs,
    outputSize: frozen[frozen.length - 1].outputs,
    layers: Object.freeze(frozen)
  });
};

const activate = (activation: Activation, value: number) => {
  switch (activation) {
    case 'sigmoid':
      return 1 / (1 + Math.exp(-value));
    case 'tanh':
      return Math.tanh(value);
    case 'relu':
      return value > 0 ? value : 0;
    case 'linear':
      return value;
  }
};

export const evaluateNetwork = (network: NeuralNetwork, input: ReadonlyArray<number>): number[] => {
  if (input.length !== network.inputSize) {
    throw new RangeError(`Network "${network.id}" expects ${network.inputSize} inputs, got ${input.length}`);
  }

  let current: ReadonlyArray<number> = input;
  for (const layer of network.layers) {
    const next: number[] = new Array(layer.outputs);
    for (let row = 0; row < layer.outputs; row += 1) {
      const weights = layer.weights[row];
      let sum = layer.biases[row];
      for (let col = 0; col < layer.inputs; col += 1) {
        sum += weights[col] * current[col];
      }
      next[row] = activate(layer.activation, sum);
    }
    current = next;
  }
  return [...current];
};

export type NetworkProvider = {
  tryGet: (id: string) => NeuralNetwork | null;
};

type CacheEntry = { network: NeuralNetwork } | { error: NetworkLoadError };

export type NetworkShape = {
  inputs: number;
  outputs: number;
};

export const NETWORK_IDS = {
  passScoring: 'pass_scoring',
  forwardDecision: 'forward_decision'
} as const;

/** Input and output sizes the engine's feature builders and decoders expect. */
export const NETWORK_SHAPES: Readonly<Partial<Record<string, NetworkShape>>> = {
  [NETWORK_IDS.passScoring]: { inputs: 5, outputs: 1 },
  [NETWORK_IDS.forwardDecision]: { inputs: 5, outputs: 3 }
};

type RegistryConfig = {
  readSource?: (id: string) => string;
  shapes?: Readonly<Partial<Record<string, NetworkShape>>>;
  logger?: Logger;
};

const checkShape = (id: string, network: NeuralNetwork, expected: NetworkShape | undefined) => {
  if (!expected) return network;
  if (network.inputSize !== expected.inputs || network.outputSize !== expected.outputs) {
    throw new NetworkLoadError(
      id,
      `expected ${expected.inputs} inputs and ${expected.outputs} outputs, got ${network.inputSize} and ${network.outputSize}`
    );
  }
  return network;
};

const defaultReadSource = (id: string) =>
  readFileSync(new URL(`../../data/networks/${id}.json`, import.meta.url), 'utf8');

/**
 * Lazily loads each network once and keeps it for the life of the process. A failed load is
 * cached too, so the error surfaces once and the file is never re-read. Networks with a known
 * shape must match it or they count as failed.
 */
export class NetworkRegistry implements NetworkProvider {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly readSource: (id: string) => string;
  private readonly shapes: Readonly<Partial<Record<string, NetworkShape>>>;
  private readonly logger: Logger;

  constructor(config: RegistryConfig = {}) {
    this.readSource = config.readSource ?? defaultReadSource;
    this.shapes = config.shapes ?? NETWORK_SHAPES;
    this.logger = config.logger ?? rootLogger.child({ module: 'networks' });
  }

  get(id: string): NeuralNetwork {
    const entry = this.resolve(id);
    if ('error' in entry) {
      throw entry.error;
    }
    return entry.network;
  }

  tryGet(id: string): NeuralNetwork | null {
    const entry = this.resolve(id);
    return 'network' in entry ? entry.network : null;
  }

  preload(ids: readonly string[]) {
    return ids.filter((id) => this.tryGet(id) === null);
  }

  private resolve(id: string): CacheEntry {
    const cached = this.cache.get(id);
    if (cached) return cached;

    let entry: CacheEntry;
    try {
      entry = { network: checkShape(id, loadNetwork(this.readSource(id), id), this.shapes[id]) };
    } catch (error) {
      const loadError =
        error instanceof NetworkLoadError
          ? error
          : new NetworkLoadError(id, error instanceof Error ? error.message : String(error), { cause: error });
      this.logger.error({ networkId: id, err: loadError }, 'network unavailable');
      entry = { error: loadError };
    }
    this.cache.set(id, entry);
    return entry;
  }
}

let sharedRegistry: NetworkRegistry | null = null;

export const getSharedNetworkRegistry = () => {
  if (!sharedRegistry) {
    sharedRegistry = new NetworkRegistry();
  }
  return sharedRegistry;
};
