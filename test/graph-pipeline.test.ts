import { describe, it, expect } from 'vitest';
import { ARITH_OPS } from '../src/ops/math/arithmetic';
import { createEngine, executedNodes } from '../src/tests/harness';

const PASSTHROUGH = `// @input src: texture
fn shade(coord: vec2<u32>, size: vec2<u32>) -> vec4<f32> {
  return textureLoad(src, coord, 0);
}
`;

describe('Graph pipeline', () => {
  it('feeds a solid colour into a shader', () => {
    const { engine, gpu } = createEngine();
    const solid = engine.instanceNode('graphics', 'solid');
    engine.editAllNodeConfigs(solid, ([width, height]) => {
      width?.put('i32', 64);
      height?.put('i32', 32);
    });
    const shade = engine.instanceNode('graphics', 'shade');
    engine.editNodeConfig(shade, 0, v => v.put('string', PASSTHROUGH));
    engine.connect(solid, 0, shade, 0);

    engine.execute();

    const solidImage = engine.getNode(solid).output(0);
    if (solidImage?.type !== 'texture') throw new Error('solid output is not a texture');
    const source = engine.getTexture(solidImage.value);
    expect(source).toBeDefined();

    expect(gpu.mock.queue.writeTexture.mock.lastCall?.[0]).toEqual({ texture: source });
    expect(gpu.passes).toHaveLength(1);
    expect(gpu.passes[0]?.dispatchWorkgroups).toHaveBeenCalledWith(8, 4);
    const [bindGroup] = gpu.mock.device.createBindGroup.mock.calls[0] ?? [];
    expect([...(bindGroup?.entries ?? [])][1]).toEqual({ binding: 2, resource: { texture: source } });
  });

  it('re-runs the shader after the solid colour changes', () => {
    const { engine, gpu, messages } = createEngine();
    const solid = engine.instanceNode('graphics', 'solid');
    const shade = engine.instanceNode('graphics', 'shade');
    engine.editNodeConfig(shade, 0, v => v.put('string', PASSTHROUGH));
    engine.connect(solid, 0, shade, 0);
    engine.execute();
    expect(engine.isDirty()).toBe(false);

    engine.editNodeInput(solid, 0, v => v.put('f32', 1));
    expect(engine.isDirty()).toBe(true);
    messages.length = 0;
    engine.execute();

    expect(executedNodes(messages)).toEqual([solid, shade]);
    expect(gpu.passes).toHaveLength(2);
    expect(gpu.mock.queue.writeTexture.mock.lastCall?.[1]).toEqual(
      new Uint8Array(512 * 512 * 4).map((_, i) => (i % 4 === 0 || i % 4 === 3 ? 255 : 0)),
    );
  });

  it('follows an upstream resize in place', () => {
    const { engine, gpu } = createEngine();
    const solid = engine.instanceNode('graphics', 'solid');
    engine.editAllNodeConfigs(solid, ([width, height]) => {
      width?.put('i32', 64);
      height?.put('i32', 32);
    });
    const shade = engine.instanceNode('graphics', 'shade');
    engine.editNodeConfig(shade, 0, v => v.put('string', PASSTHROUGH));
    engine.connect(solid, 0, shade, 0);
    engine.execute();

    const before = engine.getNode(shade).output(0);
    if (before?.type !== 'texture') throw new Error('shade output is not a texture');
    const stale: unknown = engine.getTexture(before.value);

    engine.editNodeConfig(solid, 0, v => v.put('i32', 128));
    engine.execute();

    const after = engine.getNode(shade).output(0);
    if (after?.type !== 'texture') throw new Error('shade output is not a texture');
    expect(after.value).toEqual({ id: before.value.id, width: 128, height: 32, format: 'rgba8' });
    const current: unknown = engine.getTexture(after.value);
    const fresh = gpu.textures.filter(t => t === current);
    expect(fresh.map(t => [t.width, t.height, t.destroyed])).toEqual([[128, 32, false]]);
    expect(gpu.textures.find(t => t === stale)?.destroyed).toBe(true);
    expect(gpu.passes[1]?.dispatchWorkgroups).toHaveBeenCalledWith(16, 4);
  });

  it('recomputes a clock-driven result every frame', () => {
    const { engine, messages } = createEngine();
    const time = engine.instanceNode('core', 'time');
    const scale = engine.instanceNode('math', 'arithmetic');
    const out = engine.instanceNode('core', 'output');
    engine.editNodeConfig(scale, 0, v => v.put('i32', ARITH_OPS.indexOf('multiply')));
    engine.editNodeInput(scale, 1, v => v.put('f32', 2));
    engine.connect(time, 0, scale, 0);
    engine.connect(scale, 0, out, 0);

    engine.setTiming({ time: 1, delta: 1, frame: 1 });
    engine.execute();
    expect(engine.result(0)).toEqual({ type: 'f32', value: 2 });

    messages.length = 0;
    engine.setTiming({ time: 1.5, delta: 0.5, frame: 2 });
    engine.execute();
    expect(engine.result(0)).toEqual({ type: 'f32', value: 3 });
    expect(executedNodes(messages)).toEqual([time, scale, out]);
    expect(engine.isDirty()).toBe(true);
  });
});
