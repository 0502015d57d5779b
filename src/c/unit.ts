/**
 * @module c/unit
 *
 * 单个 C 翻译单元的输出缓冲：字符串字面量池、文件内的静态声明与函数定义。
 */

import { utf16Units } from './ctypes.js';

export interface GeneratedUnit {
  /** 输出文件名（相对输出目录） */
  readonly name: string;
  readonly content: string;
}

export class UnitWriter {
  private readonly literals = new Map<string, string>();
  private readonly literalLines: string[] = [];
  private readonly declarations: string[] = [];
  private readonly definitions: string[] = [];
  private readonly used = new Set<string>();

  constructor(
    readonly name: string,
    private readonly tag: string
  ) {}

  /** 字符串字面量的 UTF-16 常量数组名；相同文本共用一个数组 */
  literal(text: string): string {
    const existing = this.literals.get(text);
    if (existing) return existing;
    const name = `am_lit_${this.tag}_${this.literals.size}`;
    this.literals.set(text, name);
    const units = utf16Units(text);
    const body = units.length === 0 ? '0' : units.join(', ');
    this.literalLines.push(`static const uint16_t ${name}[] = {${body}};`);
    return name;
  }

  /** 单元内唯一的名字（同一 lambda 在多个泛型实例中生成多份） */
  unique(base: string): string {
    let name = base;
    for (let n = 1; this.used.has(name); n++) name = `${base}_0${n}`;
    this.used.add(name);
    return name;
  }

  declare(text: string): void {
    this.declarations.push(text);
  }

  define(text: string): void {
    this.definitions.push(text);
  }

  render(preamble: readonly string[]): GeneratedUnit {
    const sections = [preamble.join('\n'), this.literalLines.join('\n'), this.declarations.join('\n'), this.definitions.join('\n\n')];
    return { name: this.name, content: `${sections.filter(s => s.length > 0).join('\n\n')}\n` };
  }
}
