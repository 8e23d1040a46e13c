import { ScrollMomentumEngine } from "../src";

const engine = new ScrollMomentumEngine();

const deltas: number[] = [];
let t = 0;
for (let i = 0; i < 10; i++, t += 16) {
  const delta = engine.update({ direction: 1, fingerSpread: 150 }, t);
  if (delta !== null) deltas.push(delta);
}
for (let i = 0; i < 60; i++, t += 16) {
  const delta = engine.update(null, t);
  if (delta !== null) deltas.push(delta);
}

console.log("Scroll deltas while held and coasting:", deltas);
