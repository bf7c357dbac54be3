/**
 * @file shade.ts
 * @description Runs a user-written WGSL function over every pixel of its output texture.
 *
 * The source declares node inputs with pragmas:
 *
 *   // @input brightness: f32 = 1.0
 *   // @input source: texture
 *
 * and defines `fn shade(coord: vec2<u32>, size: vec2<u32>) -> vec4<f32>`. Scalars are read
 * as `params.<name>`, textures by name with `textureLoad`.
 *
 * @pitfalls
 * - Bad pragmas do not reject the config edit; the node keeps its last valid inputs and
 *   fails at execute with a ScriptError so the user can keep typing.
 * - The output is always rgba8 (storage textures need a fixed format in WGSL).
 */
import { BUFFER_USAGE, SHADER_WORKGROUP_SIZE } from '../../constants';
import { ScriptError, type LocatedError } from '../../errors';
import { GpuCache } from '../../gpu/gpu-cache';
import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { CHECK, textureHandle } from '../../value/texture';
import {
  inputValue,
  NULL_VALUE,
  outputAt,
  unwrapValue,
  type Inputs,
  type Outputs,
  type Value,
} from '../../value/value';
import { addSizeConfig, readSize } from './texture-config';

export type ShaderInputType = 'f32' | 'i32' | 'texture';

export interface ShaderInput {
  name: string;
  type: ShaderInputType;
  default?: number;
  line: number;
}

export interface ShaderParse {
  inputs: ShaderInput[];
  errors: LocatedError[];
}

export const DEFAULT_SHADER = `// @input brightness: f32 = 1.0
fn shade(coord: vec2<u32>, size: vec2<u32>) -> vec4<f32> {
  let uv = vec2<f32>(coord) / vec2<f32>(size);
  return vec4<f32>(uv * params.brightness, 0.0, 1.0);
}
`;

const PRAGMA = /^\s*\/\/\s*@input\b/;
const DECLARATION = /^\s*([^\s:]+)\s*:\s*([^\s=]+)\s*(?:=\s*(\S+))?\s*$/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED = new Set(['output', 'params', 'main', 'shade', 'gid', 'size']);

function isShaderInputType(type: string): type is ShaderInputType {
  return type === 'f32' || type === 'i32' || type === 'texture';
}

export function parseShaderInputs(source: string): ShaderParse {
  const inputs: ShaderInput[] = [];
  const errors: LocatedError[] = [];
  const seen = new Set<string>();

  source.split('\n').forEach((text, i) => {
    const line = i + 1;
    const head = PRAGMA.exec(text);
    if (!head) return;
    const bodyStart = head[0].length;
    const column = (token: string) => text.indexOf(token, bodyStart) + 1;
    const fail = (message: string, col: number): void => {
      errors.push({ message, line, column: col });
    };

    const decl = DECLARATION.exec(text.slice(bodyStart));
    if (!decl) {
      fail('Expected `name: type` or `name: type = default`', bodyStart + 1);
      return;
    }
    const name = decl[1] ?? '';
    const type = decl[2] ?? '';
    const raw = decl[3];

    if (!IDENTIFIER.test(name)) return fail(`Invalid input name "${name}"`, column(name));
    if (RESERVED.has(name)) return fail(`Input name "${name}" is reserved`, column(name));
    if (seen.has(name)) return fail(`Input "${name}" is declared twice`, column(name));
    if (!isShaderInputType(type)) return fail(`Unknown input type "${type}", expected f32, i32 or texture`, column(type));

    let fallback: number | undefined;
    if (raw !== undefined) {
      const parsed = Number(raw);
      if (type === 'texture') return fail('Texture inputs cannot have a default', column(raw));
      if (!Number.isFinite(parsed) || (type === 'i32' && !Number.isInteger(parsed))) {
        return fail(`Invalid ${type} default "${raw}"`, column(raw));
      }
      fallback = parsed;
    }

    seen.add(name);
    inputs.push({ name, type, default: fallback, line });
  });

  return { inputs, errors };
}

/** Bindings: 0 output storage texture, 1 scalar params (if any), 2.. input textures. */
export function buildShaderModule(source: string, inputs: readonly ShaderInput[]): string {
  const scalars = inputs.filter(i => i.type !== 'texture');
  const textures = inputs.filter(i => i.type === 'texture');
  const lines = ['@group(0) @binding(0) var output: texture_storage_2d<rgba8unorm, write>;'];
  if (scalars.length > 0) {
    lines.push(`struct Params {\n${scalars.map(s => `  ${s.name}: ${s.type},`).join('\n')}\n};`);
    lines.push('@group(0) @binding(1) var<uniform> params: Params;');
  }
  textures.forEach((t, k) => lines.push(`@group(0) @binding(${k + 2}) var ${t.name}: texture_2d<f32>;`));
  lines.push(source);

  const touch = [...(scalars.length > 0 ? ['params'] : []), ...textures.map(t => t.name)]
    .map(name => `  _ = ${name};`);
  lines.push([
    `@compute @workgroup_size(${SHADER_WORKGROUP_SIZE}, ${SHADER_WORKGROUP_SIZE})`,
    'fn main(@builtin(global_invocation_id) gid: vec3<u32>) {',
    '  let size = textureDimensions(output);',
    '  if (gid.x >= size.x || gid.y >= size.y) { return; }',
    ...touch,
    '  textureStore(output, gid.xy, shade(gid.xy, size));',
    '}',
  ].join('\n'));
  return lines.join('\n');
}

/** Packs scalar inputs into a uniform block: 4 bytes each, padded to 16. */
export function packParams(inputs: readonly ShaderInput[], values: Inputs): ArrayBuffer {
  const scalars = inputs.flatMap((input, slot) => (input.type === 'texture' ? [] : [{ input, slot }]));
  const buffer = new ArrayBuffer(Math.max(16, Math.ceil((scalars.length * 4) / 16) * 16));
  const view = new DataView(buffer);
  scalars.forEach(({ input, slot }, k) => {
    const value = inputValue(values, slot);
    if (input.type === 'i32') view.setInt32(k * 4, unwrapValue(value, 'i32') ?? 0, true);
    else view.setFloat32(k * 4, unwrapValue(value, 'f32') ?? 0, true);
  });
  return buffer;
}

export class ShadeOp extends BaseOperation {
  static readonly library = 'graphics';
  static readonly operator = 'shade';
  static readonly label = 'Shade';

  static build(): ShadeOp {
    return new ShadeOp();
  }

  private inputs: ShaderInput[] = [];
  private errors: LocatedError[] = [];
  private source = '';
  private params: GPUBuffer | undefined;

  diagnostics(): readonly LocatedError[] {
    return this.errors;
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addConfig('string', 'source')
      .meta({ kind: 'string', stringKind: 'wgsl', multiLine: true })
      .default({ type: 'string', value: DEFAULT_SHADER });
    addSizeConfig(reg);
    reg.addConfig('bool', 'preview')
      .meta({ kind: 'boolean' })
      .default({ type: 'bool', value: true })
      .onNodeBody();
  }

  override configure(_ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void {
    const source = unwrapValue(config[0] ?? NULL_VALUE, 'string') ?? '';
    const { width, height } = readSize(config, 1);
    const parsed = parseShaderInputs(source);
    this.errors = parsed.errors;
    if (parsed.errors.length === 0) {
      this.inputs = parsed.inputs;
      this.source = source;
    }

    reg.clearInputs();
    for (const input of this.inputs) {
      const builder = reg.addInput(input.type, input.name);
      if (input.default !== undefined) builder.default({ type: input.type === 'i32' ? 'i32' : 'f32', value: input.default });
    }

    const firstTexture = this.inputs.find(i => i.type === 'texture');
    const driver = firstTexture && reg.inputByName(firstTexture.name, 'texture');
    driver?.builder.tooltip('Sets the output size');
    reg.clearOutputs();
    reg.addOutput('texture', 'image')
      .meta({ kind: 'texture', format: 'rgba8', matchInput: driver ? driver.index : undefined })
      .default({ type: 'texture', value: textureHandle(width, height, 'rgba8') });
  }

  execute(ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void {
    if (this.errors.length > 0) throw new ScriptError(this.errors);

    const handle = outputAt(outputs, 0).get('texture');
    const target = ctx.texture(handle);
    if (!target) throw new Error(`Output texture ${handle.id ?? '(unallocated)'} is not in the pool`);

    const pipeline = GpuCache.getComputePipeline(ctx.device, buildShaderModule(this.source, this.inputs));
    const entries: GPUBindGroupEntry[] = [{ binding: 0, resource: target.createView() }];

    if (this.inputs.some(i => i.type !== 'texture')) {
      const data = packParams(this.inputs, inputs);
      const buffer = this.uniformBuffer(ctx, data.byteLength);
      ctx.queue.writeBuffer(buffer, 0, data);
      entries.push({ binding: 1, resource: { buffer } });
    }

    let binding = 2;
    this.inputs.forEach((input, slot) => {
      if (input.type !== 'texture') return;
      const bound = unwrapValue(inputValue(inputs, slot), 'texture');
      const texture = (bound && ctx.texture(bound)) ?? ctx.texture(CHECK);
      if (!texture) throw new Error('System texture missing from the pool');
      entries.push({ binding: binding++, resource: texture.createView() });
    });

    const bindGroup = ctx.device.createBindGroup({ layout: pipeline.getBindGroupLayout(0), entries });
    const encoder = ctx.device.createCommandEncoder({ label: 'shade' });
    const pass = encoder.beginComputePass();
    pass.setPipeline(pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.dispatchWorkgroups(Math.ceil(handle.width / SHADER_WORKGROUP_SIZE), Math.ceil(handle.height / SHADER_WORKGROUP_SIZE));
    pass.end();
    ctx.queue.submit([encoder.finish()]);
  }

  override teardown(): void {
    this.params?.destroy();
    this.params = undefined;
  }

  private uniformBuffer(ctx: ExecutionContext, size: number): GPUBuffer {
    if (this.params && this.params.size === size) return this.params;
    this.params?.destroy();
    this.params = ctx.device.createBuffer({
      label: 'shade-params',
      size,
      usage: BUFFER_USAGE.UNIFORM | BUFFER_USAGE.COPY_DST,
    });
    return this.params;
  }
}
