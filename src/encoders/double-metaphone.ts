import { BaseEncoder } from '../encoder.js';

const VOWELS = 'AEIOUY';
const SILENT_START = ['GN', 'KN', 'PN', 'WR', 'PS'];
const L_R_N_M_B_H_F_V_W_SPACE = ['L', 'R', 'N', 'M', 'B', 'H', 'F', 'V', 'W', ' '];
const ES_EP_EB_EL_EY_IB_IL_IN_IE_EI_ER = ['ES', 'EP', 'EB', 'EL', 'EY', 'IB', 'IL', 'IN', 'IE', 'EI', 'ER'];
const L_T_K_S_N_M_B_Z = ['L', 'T', 'K', 'S', 'N', 'M', 'B', 'Z'];

export interface DoubleMetaphoneOptions {
  /** Maximum length of each code, 4 by default. */
  maxCodeLength?: number;
}

/** Primary and alternate codes, each capped at the encoder's length. */
export class DoubleMetaphoneResult {
  primary = '';
  alternate = '';

  constructor(readonly maxLength: number) {}

  append(primary: string, alternate: string = primary): void {
    this.appendPrimary(primary);
    this.appendAlternate(alternate);
  }

  appendPrimary(value: string): void {
    this.primary += value.slice(0, Math.max(0, this.maxLength - this.primary.length));
  }

  appendAlternate(value: string): void {
    this.alternate += value.slice(0, Math.max(0, this.maxLength - this.alternate.length));
  }

  isComplete(): boolean {
    return this.primary.length >= this.maxLength && this.alternate.length >= this.maxLength;
  }
}

/** Upper-cased input with positional lookups. Out-of-range lookups never match. */
class Word {
  readonly length: number;
  readonly slavoGermanic: boolean;

  constructor(readonly value: string) {
    this.length = value.length;
    this.slavoGermanic = /[WK]|CZ|WITZ/.test(value);
  }

  at(index: number): string | undefined {
    return index >= 0 ? this.value[index] : undefined;
  }

  /** True when one of `options` starts at `start`. */
  has(start: number, ...options: string[]): boolean {
    return start >= 0 && options.some((option) => this.value.startsWith(option, start));
  }

  isVowelAt(index: number): boolean {
    const char = this.at(index);
    return char !== undefined && VOWELS.includes(char);
  }

  isLast(index: number): boolean {
    return index === this.length - 1;
  }

  /** Next index, skipping a doubled letter. */
  skipDouble(index: number, ...letters: string[]): number {
    return this.has(index + 1, ...letters) ? index + 2 : index + 1;
  }
}

// Each handler appends the codes for the letter at `index` and returns the
// index where scanning resumes.
type Handler = (word: Word, result: DoubleMetaphoneResult, index: number) => number;

function isGermanic(word: Word): boolean {
  return word.has(0, 'VAN ', 'VON ') || word.has(0, 'SCH');
}

function conditionC0(word: Word, index: number): boolean {
  if (word.has(index, 'CHIA')) return true;
  if (index <= 1) return false;
  if (word.isVowelAt(index - 2)) return false;
  if (!word.has(index - 1, 'ACH')) return false;
  const next = word.at(index + 2);
  return (next !== 'I' && next !== 'E') || word.has(index - 2, 'BACHER', 'MACHER');
}

function conditionCH0(word: Word, index: number): boolean {
  if (index !== 0) return false;
  if (!word.has(index + 1, 'HARAC', 'HARIS') && !word.has(index + 1, 'HOR', 'HYM', 'HIA', 'HEM')) return false;
  return !word.has(0, 'CHORE');
}

function conditionCH1(word: Word, index: number): boolean {
  return (
    isGermanic(word) ||
    word.has(index - 2, 'ORCHES', 'ARCHIT', 'ORCHID') ||
    (index > 1 && word.has(index + 2, 'T', 'S')) ||
    ((index === 0 || word.has(index - 1, 'A', 'O', 'U', 'E')) &&
      (word.has(index + 2, ...L_R_N_M_B_H_F_V_W_SPACE) || index + 1 === word.length - 1))
  );
}

const handleCH: Handler = (word, result, index) => {
  if (index > 0 && word.has(index, 'CHAE')) {
    // Michael
    result.append('K', 'X');
  } else if (conditionCH0(word, index) || conditionCH1(word, index)) {
    // Greek roots and germanic "kh"
    result.append('K');
  } else if (index > 0) {
    if (word.has(0, 'MC')) result.append('K');
    else result.append('X', 'K');
  } else {
    result.append('X');
  }
  return index + 2;
};

const handleCC: Handler = (word, result, index) => {
  if (word.has(index + 2, 'I', 'E', 'H') && !word.has(index + 2, 'HU')) {
    // accident, succeed
    if ((index === 1 && word.at(index - 1) === 'A') || word.has(index - 1, 'UCCEE', 'UCCES')) {
      result.append('KS');
    } else {
      result.append('X');
    }
    return index + 3;
  }
  result.append('K');
  return index + 2;
};

const handleC: Handler = (word, result, index) => {
  if (conditionC0(word, index)) {
    result.append('K');
    return index + 2;
  }
  if (index === 0 && word.has(index, 'CAESAR')) {
    result.append('S');
    return index + 2;
  }
  if (word.has(index, 'CH')) return handleCH(word, result, index);
  if (word.has(index, 'CZ') && !word.has(index - 2, 'WICZ')) {
    // Czerny
    result.append('S', 'X');
    return index + 2;
  }
  if (word.has(index + 1, 'CIA')) {
    // focaccia
    result.append('X');
    return index + 3;
  }
  if (word.has(index, 'CC') && !(index === 1 && word.at(0) === 'M')) return handleCC(word, result, index);
  if (word.has(index, 'CK', 'CG', 'CQ')) {
    result.append('K');
    return index + 2;
  }
  if (word.has(index, 'CI', 'CE', 'CY')) {
    if (word.has(index, 'CIO', 'CIE', 'CIA')) result.append('S', 'X');
    else result.append('S');
    return index + 2;
  }

  result.append('K');
  // Mac Caffrey, Mac Gregor
  if (word.has(index + 1, ' C', ' Q', ' G')) return index + 3;
  if (word.has(index + 1, 'C', 'K', 'Q') && !word.has(index + 1, 'CE', 'CI')) return index + 2;
  return index + 1;
};

const handleD: Handler = (word, result, index) => {
  if (word.has(index, 'DG')) {
    if (word.has(index + 2, 'I', 'E', 'Y')) {
      // edge
      result.append('J');
      return index + 3;
    }
    result.append('TK');
    return index + 2;
  }
  result.append('T');
  return word.has(index, 'DT', 'DD') ? index + 2 : index + 1;
};

const handleGH: Handler = (word, result, index) => {
  if (index > 0 && !word.isVowelAt(index - 1)) {
    result.append('K');
  } else if (index === 0) {
    result.append(word.at(index + 2) === 'I' ? 'J' : 'K');
  } else if (word.has(index - 2, 'B', 'H', 'D') || word.has(index - 3, 'B', 'H', 'D') || word.has(index - 4, 'B', 'H')) {
    // silent, as in hugh
  } else if (index > 2 && word.at(index - 1) === 'U' && word.has(index - 3, 'C', 'G', 'L', 'R', 'T')) {
    // laugh, cough, tough
    result.append('F');
  } else if (word.at(index - 1) !== 'I') {
    result.append('K');
  }
  return index + 2;
};

function handleG(word: Word, result: DoubleMetaphoneResult, index: number): number {
  const next = word.at(index + 1);
  if (next === 'H') return handleGH(word, result, index);

  if (next === 'N') {
    if (index === 1 && word.isVowelAt(0) && !word.slavoGermanic) {
      result.append('KN', 'N');
    } else if (!word.has(index + 2, 'EY') && !word.slavoGermanic) {
      result.append('N', 'KN');
    } else {
      result.append('KN');
    }
    return index + 2;
  }

  if (word.has(index + 1, 'LI') && !word.slavoGermanic) {
    result.append('KL', 'L');
    return index + 2;
  }

  // -ges-, -gep-, -gel- at the start; -ger-, -gy- elsewhere
  if (
    (index === 0 && (next === 'Y' || word.has(index + 1, ...ES_EP_EB_EL_EY_IB_IL_IN_IE_EI_ER))) ||
    ((word.has(index + 1, 'ER') || next === 'Y') &&
      !word.has(0, 'DANGER', 'RANGER', 'MANGER') &&
      !word.has(index - 1, 'E', 'I') &&
      !word.has(index - 1, 'RGY', 'OGY'))
  ) {
    result.append('K', 'J');
    return index + 2;
  }

  // Italian biaggi
  if (word.has(index + 1, 'E', 'I', 'Y') || word.has(index - 1, 'AGGI', 'OGGI')) {
    if (isGermanic(word) || word.has(index + 1, 'ET')) {
      result.append('K');
    } else if (word.has(index + 1, 'IER')) {
      result.append('J');
    } else {
      result.append('J', 'K');
    }
    return index + 2;
  }

  result.append('K');
  return next === 'G' ? index + 2 : index + 1;
}

const handleH: Handler = (word, result, index) => {
  // Kept only first or between vowels.
  if ((index === 0 || word.isVowelAt(index - 1)) && word.isVowelAt(index + 1)) {
    result.append('H');
    return index + 2;
  }
  return index + 1;
};

const handleJ: Handler = (word, result, index) => {
  if (word.has(index, 'JOSE') || word.has(0, 'SAN ')) {
    // Spanish: Jose, San Jacinto
    if ((index === 0 && word.at(index + 4) === ' ') || word.length === 4 || word.has(0, 'SAN ')) {
      result.append('H');
    } else {
      result.append('J', 'H');
    }
    return index + 1;
  }

  const next = word.at(index + 1);
  if (index === 0) {
    result.append('J', 'A');
  } else if (word.isVowelAt(index - 1) && !word.slavoGermanic && (next === 'A' || next === 'O')) {
    result.append('J', 'H');
  } else if (word.isLast(index)) {
    result.append('J', ' ');
  } else if (!word.has(index + 1, ...L_T_K_S_N_M_B_Z) && !word.has(index - 1, 'S', 'K', 'L')) {
    result.append('J');
  }
  return next === 'J' ? index + 2 : index + 1;
};

function conditionL0(word: Word, index: number): boolean {
  if (index === word.length - 3 && word.has(index - 1, 'ILLO', 'ILLA', 'ALLE')) return true;
  return (word.has(word.length - 2, 'AS', 'OS') || word.has(word.length - 1, 'A', 'O')) && word.has(index - 1, 'ALLE');
}

const handleL: Handler = (word, result, index) => {
  if (word.at(index + 1) !== 'L') {
    result.append('L');
    return index + 1;
  }
  // Spanish -llo, -lla: silent in the alternate
  if (conditionL0(word, index)) result.appendPrimary('L');
  else result.append('L');
  return index + 2;
};

const handleM: Handler = (word, result, index) => {
  result.append('M');
  if (word.at(index + 1) === 'M') return index + 2;
  // dumb, thumbelina
  const silentB = word.has(index - 1, 'UMB') && (index + 1 === word.length - 1 || word.has(index + 2, 'ER'));
  return silentB ? index + 2 : index + 1;
};

const handleP: Handler = (word, result, index) => {
  if (word.at(index + 1) === 'H') {
    result.append('F');
    return index + 2;
  }
  result.append('P');
  return word.skipDouble(index, 'P', 'B');
};

const handleR: Handler = (word, result, index) => {
  // French -ier, as in Rogier
  if (
    index > 3 &&
    word.isLast(index) &&
    !word.slavoGermanic &&
    word.has(index - 2, 'IE') &&
    !word.has(index - 4, 'ME', 'MA')
  ) {
    result.appendAlternate('R');
  } else {
    result.append('R');
  }
  return word.skipDouble(index, 'R');
};

const handleSC: Handler = (word, result, index) => {
  if (word.at(index + 2) === 'H') {
    if (word.has(index + 3, 'OO', 'ER', 'EN', 'UY', 'ED', 'EM')) {
      // Dutch: school, schenker
      if (word.has(index + 3, 'ER', 'EN')) result.append('X', 'SK');
      else result.append('SK');
    } else if (index === 0 && !word.isVowelAt(3) && word.at(3) !== 'W') {
      result.append('X', 'S');
    } else {
      result.append('X');
    }
  } else if (word.has(index + 2, 'I', 'E', 'Y')) {
    result.append('S');
  } else {
    result.append('SK');
  }
  return index + 3;
};

const handleS: Handler = (word, result, index) => {
  // island, carlisle
  if (word.has(index - 1, 'ISL', 'YSL')) return index + 1;

  if (index === 0 && word.has(index, 'SUGAR')) {
    result.append('X', 'S');
    return index + 1;
  }

  if (word.has(index, 'SH')) {
    if (word.has(index + 1, 'HEIM', 'HOEK', 'HOLM', 'HOLZ')) result.append('S');
    else result.append('X');
    return index + 2;
  }

  if (word.has(index, 'SIO', 'SIA') || word.has(index, 'SIAN')) {
    if (word.slavoGermanic) result.append('S');
    else result.append('S', 'X');
    return index + 3;
  }

  // smith matches schmidt, and slavic -sz-
  if ((index === 0 && word.has(index + 1, 'M', 'N', 'L', 'W')) || word.has(index + 1, 'Z')) {
    result.append('S', 'X');
    return word.skipDouble(index, 'Z');
  }

  if (word.has(index, 'SC')) return handleSC(word, result, index);

  // French -ais, -ois
  if (index > 1 && word.isLast(index) && word.has(index - 2, 'AI', 'OI')) {
    result.appendAlternate('S');
  } else {
    result.append('S');
  }
  return word.skipDouble(index, 'S', 'Z');
};

const handleT: Handler = (word, result, index) => {
  if (word.has(index, 'TION') || word.has(index, 'TIA', 'TCH')) {
    result.append('X');
    return index + 3;
  }
  if (word.has(index, 'TH') || word.has(index, 'TTH')) {
    // thomas, thames
    if (word.has(index + 2, 'OM', 'AM') || isGermanic(word)) result.append('T');
    else result.append('0', 'T');
    return index + 2;
  }
  result.append('T');
  return word.skipDouble(index, 'T', 'D');
};

const handleW: Handler = (word, result, index) => {
  if (word.has(index, 'WR')) {
    result.append('R');
    return index + 2;
  }

  if (index === 0 && (word.isVowelAt(index + 1) || word.has(index, 'WH'))) {
    // Wasserman matches Vasserman
    if (word.isVowelAt(index + 1)) result.append('A', 'F');
    else result.append('A');
    return index + 1;
  }

  // Arnow matches Arnoff
  if (
    (word.isLast(index) && word.isVowelAt(index - 1)) ||
    word.has(index - 1, 'EWSKI', 'EWSKY', 'OWSKI', 'OWSKY') ||
    word.has(0, 'SCH')
  ) {
    result.appendAlternate('F');
    return index + 1;
  }

  // Polish filipowicz
  if (word.has(index, 'WICZ', 'WITZ')) {
    result.append('TS', 'FX');
    return index + 4;
  }

  return index + 1;
};

const handleX: Handler = (word, result, index) => {
  if (index === 0) {
    result.append('S');
    return index + 1;
  }
  // French breaux
  const silent = word.isLast(index) && (word.has(index - 3, 'IAU', 'EAU') || word.has(index - 2, 'AU', 'OU'));
  if (!silent) result.append('KS');
  return word.skipDouble(index, 'C', 'X');
};

const handleZ: Handler = (word, result, index) => {
  if (word.at(index + 1) === 'H') {
    // pinyin zhao
    result.append('J');
    return index + 2;
  }
  if (word.has(index + 1, 'ZO', 'ZI', 'ZA') || (word.slavoGermanic && index > 0 && word.at(index - 1) !== 'T')) {
    result.append('S', 'TS');
  } else {
    result.append('S');
  }
  return word.skipDouble(index, 'Z');
};

/** Letters with a fixed code; a doubled letter is coded once. */
function single(code: string): Handler {
  return (word, result, index) => {
    result.append(code);
    return word.skipDouble(index, word.at(index) ?? '');
  };
}

const HANDLERS: Partial<Record<string, Handler>> = {
  B: single('P'),
  C: handleC,
  D: handleD,
  F: single('F'),
  G: handleG,
  H: handleH,
  J: handleJ,
  K: single('K'),
  L: handleL,
  M: handleM,
  N: single('N'),
  P: handleP,
  Q: single('K'),
  R: handleR,
  S: handleS,
  T: handleT,
  V: single('F'),
  W: handleW,
  X: handleX,
  Z: handleZ,
  'Ç': (_word, result, index) => {
    result.append('S');
    return index + 1;
  },
  'Ñ': (_word, result, index) => {
    result.append('N');
    return index + 1;
  },
};

/**
 * Double Metaphone (Lawrence Philips, 2000). Produces a primary code and an
 * alternate code for names whose pronunciation varies by origin; `encode`
 * returns the primary one.
 *
 * @example new DoubleMetaphone().doubleMetaphone('jumped') → { primary: 'JMPT', alternate: 'AMPT' }
 */
export class DoubleMetaphone extends BaseEncoder {
  readonly name = 'double-metaphone';
  readonly maxCodeLength: number;

  constructor(options: DoubleMetaphoneOptions = {}) {
    super();
    this.maxCodeLength = options.maxCodeLength ?? 4;
  }

  encode(value: string): string {
    return this.doubleMetaphone(value).primary;
  }

  encodeAlternate(value: string): string {
    return this.doubleMetaphone(value).alternate;
  }

  /** Compares primary codes, or alternate codes when `alternate` is set. */
  isDoubleMetaphoneEqual(first: string, second: string, alternate = false): boolean {
    const a = this.doubleMetaphone(first);
    const b = this.doubleMetaphone(second);
    return alternate ? a.alternate === b.alternate : a.primary === b.primary;
  }

  doubleMetaphone(value: string): DoubleMetaphoneResult {
    const result = new DoubleMetaphoneResult(this.maxCodeLength);
    const trimmed = value.trim();
    if (trimmed.length === 0) return result;

    const word = new Word(trimmed.toUpperCase());
    let index = SILENT_START.some((prefix) => word.value.startsWith(prefix)) ? 1 : 0;

    while (!result.isComplete() && index < word.length) {
      if (word.isVowelAt(index)) {
        if (index === 0) result.append('A');
        index++;
        continue;
      }
      const handler = HANDLERS[word.at(index) ?? ''];
      index = handler ? handler(word, result, index) : index + 1;
    }

    return result;
  }
}
