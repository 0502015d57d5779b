/**
 * @module binder/flow
 *
 * 结构化控制流分析：语句能否正常结束（落到下一条语句）。
 * 用于缺失返回检查（B017）与分支退出后的可空性收窄。
 */

import type { Block, Statement } from '../types.js';

export function completesNormally(stmt: Statement): boolean {
  switch (stmt.kind) {
    case 'Return':
    case 'Throw':
    case 'Break':
    case 'Continue':
      return false;
    case 'Block':
      return blockCompletes(stmt);
    case 'Scope':
      return blockCompletes(stmt.body);
    case 'If':
      return blockCompletes(stmt.then) || stmt.otherwise === null || completesNormally(stmt.otherwise);
    case 'While':
      return !(stmt.cond.kind === 'Bool' && stmt.cond.value) || containsBreak(stmt.body);
    case 'Loop':
      return containsBreak(stmt.body);
    case 'Switch': {
      if (!stmt.cases.some(c => c.isDefault)) return true;
      return stmt.cases.some(c => blockCompletes(c.body));
    }
    default:
      return true;
  }
}

export function blockCompletes(block: Block): boolean {
  return block.statements.every(completesNormally);
}

/**
 * 循环体中是否有跳出该循环的 break（不计嵌套循环内部的 break）。
 */
export function containsBreak(block: Block): boolean {
  return block.statements.some(breaksOut);
}

function breaksOut(stmt: Statement): boolean {
  switch (stmt.kind) {
    case 'Break':
      return true;
    case 'Block':
      return containsBreak(stmt);
    case 'Scope':
      return containsBreak(stmt.body);
    case 'If':
      return containsBreak(stmt.then) || (stmt.otherwise !== null && breaksOut(stmt.otherwise));
    case 'Switch':
      return stmt.cases.some(c => containsBreak(c.body));
    default:
      return false;
  }
}
