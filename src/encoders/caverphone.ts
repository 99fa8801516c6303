import { BaseEncoder } from '../encoder.js';

type Step = readonly [RegExp, string];

// Rewrite steps are applied in order to the lower-cased letters of the input.
const step = (pattern: string, replacement: string): Step => [new RegExp(pattern, 'g'), replacement];

const START_STEPS: readonly Step[] = [
  step('^cough', 'cou2f'),
  step('^rough', 'rou2f'),
  step('^tough', 'tou2f'),
  step('^enough', 'enou2f'),
];

const REPLACEMENT_STEPS: readonly Step[] = [
  step('cq', '2q'),
  step('ci', 'si'),
  step('ce', 'se'),
  step('cy', 'sy'),
  step('tch', '2ch'),
  step('c', 'k'),
  step('q', 'k'),
  step('x', 'k'),
  step('v', 'f'),
  step('dg', '2g'),
  step('tio', 'sio'),
  step('tia', 'sia'),
  step('d', 't'),
  step('ph', 'fh'),
  step('b', 'p'),
  step('sh', 's2'),
  step('z', 's'),
  step('^[aeiou]', 'A'),
  step('[aeiou]', '3'),
];

const COLLAPSE_STEPS: readonly Step[] = [
  step('3gh3', '3kh3'),
  step('gh', '22'),
  step('g', 'k'),
  step('s+', 'S'),
  step('t+', 'T'),
  step('p+', 'P'),
  step('k+', 'K'),
  step('f+', 'F'),
  step('m+', 'M'),
  step('n+', 'N'),
  step('w3', 'W3'),
  step('wh3', 'Wh3'),
];

const CAVERPHONE1_STEPS: readonly Step[] = [
  ...START_STEPS,
  step('^gn', '2n'),
  step('mb$', 'm2'),
  ...REPLACEMENT_STEPS,
  ...COLLAPSE_STEPS,
  step('w', '2'),
  step('^h', 'A'),
  step('h', '2'),
  step('r3', 'R3'),
  step('r', '2'),
  step('l3', 'L3'),
  step('l', '2'),
  step('j', 'y'),
  step('y3', 'Y3'),
  step('y', '2'),
  step('2', ''),
  step('3', ''),
];

const CAVERPHONE2_STEPS: readonly Step[] = [
  step('e$', ''),
  ...START_STEPS,
  step('^trough', 'trou2f'),
  step('^gn', '2n'),
  step('mb$', 'm2'),
  ...REPLACEMENT_STEPS,
  step('j', 'y'),
  step('^y3', 'Y3'),
  step('^y', 'A'),
  step('y', '3'),
  ...COLLAPSE_STEPS,
  step('w$', '3'),
  step('w', '2'),
  step('^h', 'A'),
  step('h', '2'),
  step('r3', 'R3'),
  step('r$', '3'),
  step('r', '2'),
  step('l3', 'L3'),
  step('l$', '3'),
  step('l', '2'),
  step('2', ''),
  step('3$', 'A'),
  step('3', ''),
];

function caverphone(value: string, steps: readonly Step[], length: number): string {
  const letters = value.toLowerCase().replace(/[^a-z]/g, '');
  const code = steps.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), letters);
  return (code + '1'.repeat(length)).slice(0, length);
}

/**
 * Caverphone 1.0: six-character codes.
 *
 * @example new Caverphone1().encode('Thompson') → 'TMPSN1'
 */
export class Caverphone1 extends BaseEncoder {
  readonly name = 'caverphone1';

  encode(value: string): string {
    return caverphone(value, CAVERPHONE1_STEPS, 6);
  }
}

/**
 * Caverphone 2.0: ten-character codes.
 *
 * @example new Caverphone2().encode('Stevenson') → 'STFNSN1111'
 */
export class Caverphone2 extends BaseEncoder {
  readonly name = 'caverphone2';

  encode(value: string): string {
    return caverphone(value, CAVERPHONE2_STEPS, 10);
  }
}
