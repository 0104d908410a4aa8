/**
 * ContractCheck Contract Model — Builder and Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AccessMode,
  ArgumentKind,
  BuiltInTag,
  DataType,
  OperatesOn,
  builtIn,
  createContract,
  field,
  formatArgument,
  formatInvocationArgument,
  formatSignature,
  invocation,
  invocationArg,
  operator,
  scalar,
  userKernel,
} from '../src/index.js';

describe('builders', () => {
  it('gives built-ins degree-of-freedom iteration and user kernels cell columns', () => {
    expect(builtIn('setval_c', [field(DataType.Real, AccessMode.Write, 'w0')]).operatesOn).toBe(
      OperatesOn.DegreeOfFreedom,
    );
    expect(userKernel('k', [field(DataType.Real, AccessMode.Write, 'w0')]).operatesOn).toBe(
      OperatesOn.CellColumn,
    );
  });

  it('collapses and sorts tags', () => {
    const contract = builtIn('x', [scalar(DataType.Real, AccessMode.Sum)], [
      BuiltInTag.ZeroOutput,
      BuiltInTag.CrossSpace,
      BuiltInTag.ZeroOutput,
    ]);
    expect(contract.tags).toEqual([BuiltInTag.CrossSpace, BuiltInTag.ZeroOutput]);
  });

  it('copies argument lists so later mutation of the input has no effect', () => {
    const args = [field(DataType.Real, AccessMode.Write, 'w0')];
    const contract = userKernel('k', args);
    args.push(scalar(DataType.Real));
    expect(contract.arguments).toHaveLength(1);
  });

  it('freezes contracts and their arguments', () => {
    const contract = createContract({
      name: 'k',
      arguments: [field(DataType.Real, AccessMode.Write, 'w0')],
      operatesOn: OperatesOn.Domain,
      isBuiltIn: false,
    });
    expect(Object.isFrozen(contract)).toBe(true);
    expect(Object.isFrozen(contract.arguments)).toBe(true);
    expect(Object.isFrozen(contract.arguments[0]?.spaces)).toBe(true);
    expect(contract.tags).toEqual([]);
  });

  it('leaves unresolved invocation arguments null', () => {
    expect(invocationArg('u')).toEqual({ handle: 'u', kind: null, dataType: null });
  });

  it('builds an invocation with its arguments in order', () => {
    const call = invocation('invoke_0', 'setval_c', [invocationArg('u'), invocationArg('c')]);
    expect(call.arguments.map((a) => a.handle)).toEqual(['u', 'c']);
  });
});

describe('formatting', () => {
  it('renders an operator with its to and from spaces', () => {
    expect(formatArgument(operator(DataType.Real, AccessMode.Read, 'w0', 'w1'))).toBe(
      'operator:real:read@w0->w1',
    );
  });

  it('renders a scalar without spaces', () => {
    expect(formatArgument(scalar(DataType.Integer, AccessMode.Sum))).toBe('scalar:integer:sum');
  });

  it('renders a full signature', () => {
    const contract = builtIn('inc_X_plus_Y', [
      field(DataType.Real, AccessMode.ReadWrite, 'any_space_1'),
      field(DataType.Real, AccessMode.Read, 'any_space_1'),
    ]);
    expect(formatSignature(contract)).toBe(
      'inc_X_plus_Y(field:real:readwrite@any_space_1, field:real:read@any_space_1)',
    );
  });

  it('renders unresolved invocation arguments with question marks', () => {
    expect(formatInvocationArgument(invocationArg('x'))).toBe('x:?:?');
    expect(formatInvocationArgument(invocationArg('y', ArgumentKind.Field, DataType.Real))).toBe(
      'y:field:real',
    );
  });
});
