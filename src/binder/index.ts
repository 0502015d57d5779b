/**
 * @module binder
 *
 * 语义分析：声明模型、逐文件的名字与类型绑定、泛型实例闭包。
 */

export { buildProgramModel, type ProgramModelResult } from './declarations.js';
export { bindFile, type BindFileOptions } from './module.js';
export {
  InstantiationRegistry,
  functionInstanceKey,
  methodSubstitution,
  type ClassInstance,
  type FunctionInstance,
  type InterfaceInstance,
} from './generics.js';
export * from './members.js';
export * from './model.js';
export { equalityPlan, stringifyPlan, isArithmetic } from './plans.js';
export { TypeSystem, COST, type Type, type ObjectType, type PrimitiveType, type FunctionType, type ArrayType, type Substitution } from './type_system.js';
