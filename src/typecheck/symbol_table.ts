import type { Span, VarType } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

export interface SymbolInfo {
  readonly name: string;
  readonly type: VarType;
  readonly span?: Span;
}

/**
 * 扁平符号表：整个程序共用一张 name → type 映射，不区分块作用域。
 *
 * 每个标识符只能声明一次，无论两次声明的类型是否相同。
 */
export class SymbolTable {
  private readonly symbols = new Map<string, SymbolInfo>();

  declare(name: string, type: VarType, span?: Span): SymbolInfo {
    if (this.symbols.has(name)) {
      Diagnostics.multipleDeclaration(name, span).throw();
    }
    const symbol: SymbolInfo = span !== undefined ? { name, type, span } : { name, type };
    this.symbols.set(name, symbol);
    return symbol;
  }

  lookup(name: string): VarType | undefined {
    return this.symbols.get(name)?.type;
  }

  /** 读取或写入已声明的标识符；未声明时抛出 UndefinedIdentifier */
  require(name: string, span?: Span): VarType {
    const symbol = this.symbols.get(name);
    if (!symbol) {
      return Diagnostics.undefinedIdentifier(name, span).throw();
    }
    return symbol.type;
  }

  has(name: string): boolean {
    return this.symbols.has(name);
  }

  get size(): number {
    return this.symbols.size;
  }

  entries(): ReadonlyMap<string, VarType> {
    return new Map([...this.symbols.values()].map(symbol => [symbol.name, symbol.type]));
  }
}
