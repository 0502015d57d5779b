/**
 * @module binder/overloads
 *
 * 重载决议：按参数个数过滤候选，推断方法级泛型实参，
 * 以各实参的转换代价之和排序，唯一最小者胜出。
 *
 * 代价排序：精确匹配 < 可空包装 < 数值拓宽 < 向上转型到父类 < 向上转型到接口 < 泛型形参。
 * 同一输入总得到同一结果：候选按声明顺序考察，平局时报告全部平局候选。
 */

import type { MethodInfo } from './model.js';
import { mentionsOwner, unify } from './generics.js';
import { COST, paramKey, TypeSystem, type Type } from './type_system.js';

export interface OverloadCandidate {
  readonly method: MethodInfo;
  /** 代入接收者实参后的形参类型 */
  readonly params: readonly Type[];
  readonly ret: Type;
}

export type OverloadResult<C extends OverloadCandidate> =
  | {
      readonly kind: 'resolved';
      readonly candidate: C;
      readonly typeArgs: readonly Type[];
      /** 代入方法级实参后的形参与返回类型 */
      readonly params: readonly Type[];
      readonly ret: Type;
      readonly cost: number;
    }
  | { readonly kind: 'none' }
  | { readonly kind: 'ambiguous'; readonly candidates: readonly C[] };

interface Applicable<C extends OverloadCandidate> {
  readonly candidate: C;
  readonly typeArgs: readonly Type[];
  readonly params: readonly Type[];
  readonly ret: Type;
  readonly cost: number;
}

function applicable<C extends OverloadCandidate>(candidate: C, args: readonly Type[]): Applicable<C> | null {
  if (candidate.params.length !== args.length) return null;
  const { method } = candidate;
  let params = candidate.params;
  let ret = candidate.ret;
  let typeArgs: Type[] = [];
  if (method.typeParams.length > 0) {
    const bindings = new Map<string, Type>();
    params.forEach((p, i) => {
      const arg = args[i];
      if (arg) unify(p, arg, method.typeParamOwner, bindings);
    });
    const inferred: Type[] = [];
    for (const name of method.typeParams) {
      const bound = bindings.get(paramKey(method.typeParamOwner, name));
      if (!bound) return null;
      inferred.push(bound);
    }
    typeArgs = inferred;
    const subst = TypeSystem.bind(method.typeParamOwner, method.typeParams, typeArgs);
    params = params.map(p => TypeSystem.substitute(p, subst));
    ret = TypeSystem.substitute(ret, subst);
  }
  let cost = 0;
  for (const [i, param] of params.entries()) {
    const arg = args[i];
    if (!arg) return null;
    const step = TypeSystem.conversionCost(arg, param);
    if (step === null) return null;
    cost += step;
    const declared = candidate.params[i];
    if (declared && method.typeParams.length > 0 && mentionsOwner(declared, method.typeParamOwner)) cost += COST.TYPE_PARAM;
  }
  return { candidate, typeArgs, params, ret, cost };
}

export function resolveOverload<C extends OverloadCandidate>(
  candidates: readonly C[],
  args: readonly Type[]
): OverloadResult<C> {
  const viable: Applicable<C>[] = [];
  for (const candidate of candidates) {
    const result = applicable(candidate, args);
    if (result) viable.push(result);
  }
  if (viable.length === 0) return { kind: 'none' };
  const best = Math.min(...viable.map(v => v.cost));
  const winners = viable.filter(v => v.cost === best);
  const [winner] = winners;
  if (!winner) return { kind: 'none' };
  if (winners.length > 1) return { kind: 'ambiguous', candidates: winners.map(w => w.candidate) };
  return {
    kind: 'resolved',
    candidate: winner.candidate,
    typeArgs: winner.typeArgs,
    params: winner.params,
    ret: winner.ret,
    cost: winner.cost,
  };
}

/** 诊断信息中的候选签名 */
export function formatSignature(candidate: OverloadCandidate): string {
  return `${candidate.method.qualifiedName}(${candidate.params.map(p => TypeSystem.format(p)).join(', ')})`;
}
