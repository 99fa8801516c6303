import { BaseEncoder } from '../encoder.js';

const IGNORE = '-';

const UMLAUTS: Record<string, string> = { Ä: 'A', Ö: 'O', Ü: 'U' };

/**
 * Collects digits, dropping repeats of the previous code and any `0` that
 * is not the first digit.
 */
class CologneOutput {
  private code = '';
  private lastCode = '';

  put(digit: string): void {
    if (digit !== IGNORE && digit !== this.lastCode && (digit !== '0' || this.code.length === 0)) {
      this.code += digit;
    }
    this.lastCode = digit;
  }

  get isEmpty(): boolean {
    return this.code.length === 0;
  }

  toString(): string {
    return this.code;
  }
}

/**
 * Kölner Phonetik, a Soundex-like code for German names.
 *
 * @example new ColognePhonetic().encode('Müller-Lüdenscheidt') → '65752682'
 */
export class ColognePhonetic extends BaseEncoder {
  readonly name = 'cologne-phonetic';

  encode(value: string): string {
    const input = Array.from(value.toUpperCase(), (char) => UMLAUTS[char] ?? char);
    const output = new CologneOutput();
    let lastChar = IGNORE;

    input.forEach((char, index) => {
      if (char < 'A' || char > 'Z') return;
      const next = input[index + 1] ?? IGNORE;

      if ('AEIJOUY'.includes(char)) {
        output.put('0');
      } else if (char === 'B' || (char === 'P' && next !== 'H')) {
        output.put('1');
      } else if ((char === 'D' || char === 'T') && !'CSZ'.includes(next)) {
        output.put('2');
      } else if ('FPVW'.includes(char)) {
        output.put('3');
      } else if ('GKQ'.includes(char)) {
        output.put('4');
      } else if (char === 'X' && !'CKQ'.includes(lastChar)) {
        output.put('4');
        output.put('8');
      } else if (char === 'S' || char === 'Z') {
        output.put('8');
      } else if (char === 'C') {
        if (output.isEmpty) {
          output.put('AHKLOQRUX'.includes(next) ? '4' : '8');
        } else if ('SZ'.includes(lastChar) || !'AHKOQUX'.includes(next)) {
          output.put('8');
        } else {
          output.put('4');
        }
      } else if ('DTX'.includes(char)) {
        output.put('8');
      } else if (char === 'R') {
        output.put('7');
      } else if (char === 'L') {
        output.put('5');
      } else if (char === 'M' || char === 'N') {
        output.put('6');
      } else if (char === 'H') {
        output.put(IGNORE);
      }

      lastChar = char;
    });

    return output.toString();
  }
}
