import { InvalidArgumentError } from '../errors/DomainErrors.js';

/** 可以送進 batch port 的參數型別；null / undefined 代表「省略」 */
export type CommandArgument = string | number | bigint | boolean | null | undefined;

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * 將單一參數正規化為協定文字
 *
 * - null / undefined / 空字串 → undefined（整個 token 省略）
 * - boolean → 'true' / 'false'
 * - 含換行的字串會把一行拆成兩個指令，直接拒絕
 */
export function toArgumentText(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;

  switch (typeof value) {
    case 'string': {
      if (/[\r\n]/.test(value)) {
        throw new InvalidArgumentError(`Argument ${JSON.stringify(value)} contains a line break`);
      }
      const trimmed = value.trim();
      return trimmed === '' ? undefined : trimmed;
    }
    case 'number':
      if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`Argument ${value} is not a finite number`);
      }
      return String(value);
    case 'bigint':
      return value.toString();
    case 'boolean':
      return value ? 'true' : 'false';
    default:
      throw new InvalidArgumentError(
        `Argument of type ${describe(value)} cannot be sent to IGV; expected a string, number or boolean`,
      );
  }
}
