import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { FrozenStateError, NerEvalError } from './errors.js';

export const UNK_ID = 0;

const AlphabetFileSchema = z.object({
  name: z.string().min(1),
  reserved: z.array(z.string()).min(1),
  instances: z.array(z.string()),
  singletons: z.array(z.number().int().nonnegative()).default([])
}).superRefine((file, ctx) => {
  // ids are file positions, so every symbol must appear exactly once
  const seen = new Set<string>();
  for (const symbol of [...file.reserved, ...file.instances]) {
    if (seen.has(symbol)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate symbol '${symbol}'` });
    seen.add(symbol);
  }
  const size = file.reserved.length + file.instances.length;
  for (const id of file.singletons) {
    if (id >= size) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['singletons'], message: `singleton id ${id} outside alphabet of size ${size}` });
  }
});

export type AlphabetFile = z.infer<typeof AlphabetFileSchema>;

/**
 * Bidirectional symbol <-> id table for one vocabulary (words, characters or tags).
 *
 * The first `reserved` symbols take ids 0..K-1, and id 0 doubles as the unknown id:
 * lookups of absent symbols resolve to it. An alphabet grows while building and
 * is read-only after close().
 */
export class Alphabet {
  private readonly instances: string[] = [];
  private readonly index = new Map<string, number>();
  private readonly singletonIds = new Set<number>();
  private frozen = false;

  constructor(readonly name: string, readonly reserved: readonly string[]) {
    if (reserved.length === 0) throw new NerEvalError(`Alphabet '${name}' needs at least one reserved symbol for the unknown id`);
    for (const r of reserved) this.insert(r);
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get numReserved(): number {
    return this.reserved.length;
  }

  add(symbol: string): number {
    if (this.frozen) throw new FrozenStateError(`Cannot add '${symbol}' to closed alphabet '${this.name}'`);
    return this.index.get(symbol) ?? this.insert(symbol);
  }

  has(symbol: string): boolean {
    return this.index.has(symbol);
  }

  getIndex(symbol: string): number {
    return this.index.get(symbol) ?? UNK_ID;
  }

  getInstance(id: number): string {
    const symbol = this.instances[id];
    if (symbol === undefined) throw new RangeError(`Id ${id} out of range for alphabet '${this.name}' (size ${this.size()})`);
    return symbol;
  }

  size(): number {
    return this.instances.length;
  }

  *items(): IterableIterator<[string, number]> {
    for (let i = 0; i < this.instances.length; i++) yield [this.instances[i]!, i];
  }

  addSingleton(id: number) {
    if (this.frozen) throw new FrozenStateError(`Cannot mark singleton on closed alphabet '${this.name}'`);
    this.singletonIds.add(id);
  }

  isSingleton(id: number): boolean {
    return this.singletonIds.has(id);
  }

  close() {
    this.frozen = true;
  }

  toJSON(): AlphabetFile {
    return {
      name: this.name,
      reserved: [...this.reserved],
      instances: this.instances.slice(this.reserved.length),
      singletons: [...this.singletonIds].sort((a, b) => a - b)
    };
  }

  static fromJSON(data: unknown): Alphabet {
    const parsed = AlphabetFileSchema.safeParse(data);
    if (!parsed.success) throw new NerEvalError(`Invalid alphabet file: ${parsed.error.message}`);
    const { name, reserved, instances, singletons } = parsed.data;

    const alphabet = new Alphabet(name, reserved);
    for (const s of instances) alphabet.add(s);
    for (const id of singletons) alphabet.addSingleton(id);
    alphabet.close();
    return alphabet;
  }

  static filePath(directory: string, name: string): string {
    return path.join(directory, `${name}.json`);
  }

  save(directory: string) {
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(Alphabet.filePath(directory, this.name), JSON.stringify(this.toJSON(), null, 2) + '\n', 'utf8');
  }

  static load(directory: string, name: string): Alphabet {
    const filePath = Alphabet.filePath(directory, name);
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
      throw new NerEvalError(`Cannot read alphabet ${filePath}`, { cause: err });
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new NerEvalError(`Alphabet ${filePath} is not valid JSON`, { cause: err });
    }
    return Alphabet.fromJSON(data);
  }

  private insert(symbol: string): number {
    const id = this.instances.length;
    this.instances.push(symbol);
    this.index.set(symbol, id);
    return id;
  }
}
