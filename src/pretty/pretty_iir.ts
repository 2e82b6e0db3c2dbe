import { dimensionName } from '../ast/ast.js';
import { assertNever } from '../ast/ast_visitor.js';
import { extentsToString } from '../iir/extent.js';
import { attrNames, loopOrderName } from '../iir/iir.js';
import { intervalToString } from '../iir/interval.js';
import { DefaultIirVisitor } from '../iir/visitor.js';
import { globalValueToString } from '../metadata/global_value.js';
import type { StencilMetaInfo } from '../metadata/meta_info.js';
import type { StencilInstantiation } from '../stencil_instantiation.js';
import type { AccessID, Expr, FieldAccess, Iir, Stmt, ValueType } from '../types.js';
import { BuiltinTypeID, VerticalLoopOrder } from '../types.js';

function typeName(type: ValueType): string {
  const qualifiers = `${type.isConst ? 'const ' : ''}${type.isVolatile ? 'volatile ' : ''}`;
  if (type.kind === 'Custom') return qualifiers + type.name;
  switch (type.typeId) {
    case BuiltinTypeID.Invalid:
      return `${qualifiers}invalid`;
    case BuiltinTypeID.Auto:
      return `${qualifiers}auto`;
    case BuiltinTypeID.Boolean:
      return `${qualifiers}bool`;
    case BuiltinTypeID.Integer:
      return `${qualifiers}int`;
    case BuiltinTypeID.Float:
      return `${qualifiers}float`;
  }
}

function signed(n: number): string {
  if (n === 0) return '';
  return n > 0 ? `+${n}` : String(n);
}

function formatFieldAccess(e: FieldAccess): string {
  const { offset } = e;
  const dims = offset.offset.map((o, i) => `${'ijk'.charAt(i)}${signed(o)}`).join(', ');
  const sign = e.negateOffset ? '-' : '';
  if (offset.state === 'unresolved') {
    return `${e.name}[${sign}${dims}; args ${offset.argumentMap.join(',')} by ${offset.argumentOffset.join(',')}]`;
  }
  if (offset.offset.every(o => o === 0)) return e.name;
  return `${e.name}[${sign}${dims}]`;
}

function operand(e: Expr): string {
  const text = formatExpr(e);
  return e.kind === 'Binary' || e.kind === 'Ternary' || e.kind === 'Assignment' ? `(${text})` : text;
}

export function formatExpr(e: Expr): string {
  switch (e.kind) {
    case 'Unary':
      return `${e.op}${operand(e.operand)}`;
    case 'Binary':
      return `${operand(e.left)} ${e.op} ${operand(e.right)}`;
    case 'Assignment':
      return `${formatExpr(e.left)} ${e.op} ${formatExpr(e.right)}`;
    case 'Ternary':
      return `${operand(e.cond)} ? ${operand(e.left)} : ${operand(e.right)}`;
    case 'FunctionCall':
    case 'StencilFunctionCall':
      return `${e.callee}(${e.args.map(formatExpr).join(', ')})`;
    case 'StencilFunctionArgument':
      return `${dimensionName(e.dimension)}${signed(e.offset)}`;
    case 'VariableAccess':
      return e.index ? `${e.name}[${formatExpr(e.index)}]` : e.name;
    case 'FieldAccess':
      return formatFieldAccess(e);
    case 'LiteralAccess':
      return e.value;
    default:
      return assertNever(e, 'expression');
  }
}

function formatBlock(statements: readonly Stmt[], level: number): string {
  if (statements.length === 0) return '{}';
  const pad = '  '.repeat(level);
  const lines = statements.map(s => `${pad}  ${formatStmt(s, level + 1)}`);
  return `{\n${lines.join('\n')}\n${pad}}`;
}

function asBlock(s: Stmt, level: number): string {
  return formatBlock(s.kind === 'Block' ? s.statements : [s], level);
}

/** One statement; nested blocks are indented from `level`. */
export function formatStmt(s: Stmt, level = 0): string {
  switch (s.kind) {
    case 'Block':
      return formatBlock(s.statements, level);
    case 'ExpressionStatement':
      return `${formatExpr(s.expr)};`;
    case 'Return':
      return `return ${formatExpr(s.expr)};`;
    case 'VariableDeclaration': {
      const decl = `${typeName(s.type)} ${s.name}${s.dimension > 0 ? `[${s.dimension}]` : ''}`;
      const [first] = s.initList;
      if (first === undefined) return `${decl};`;
      const init = s.initList.length === 1 ? formatExpr(first) : `{${s.initList.map(formatExpr).join(', ')}}`;
      return `${decl} ${s.op} ${init};`;
    }
    case 'StencilCallDeclaration':
      return `stencil-call ${s.call.callee}(${s.call.arguments.map(f => f.name).join(', ')});`;
    case 'VerticalRegionDeclaration': {
      const order = s.region.loopOrder === VerticalLoopOrder.Forward ? 'forward' : 'backward';
      return `vertical-region ${intervalToString(s.region.interval)} ${order} ${asBlock(s.region.ast, level)}`;
    }
    case 'BoundaryConditionDeclaration':
      return `boundary-condition ${s.functor}(${s.fields.map(f => f.name).join(', ')});`;
    case 'If': {
      const cond = s.cond.kind === 'ExpressionStatement' ? formatExpr(s.cond.expr) : formatStmt(s.cond, level);
      const head = `if (${cond}) ${asBlock(s.thenPart, level)}`;
      return s.elsePart ? `${head} else ${asBlock(s.elsePart, level)}` : head;
    }
    default:
      return assertNever(s, 'statement');
  }
}

function formatAccessMap(meta: StencilMetaInfo, map: ReadonlyMap<AccessID, Iir.Extents>): string {
  return [...map]
    .map(([id, extents]) => {
      const name = meta.hasAccessId(id) ? meta.getNameFromAccessId(id) : `#${id}`;
      const isPoint = extents.every(e => e.minus === 0 && e.plus === 0);
      return isPoint ? name : `${name}${extentsToString(extents)}`;
    })
    .join(' ');
}

class PrettyIirVisitor extends DefaultIirVisitor<number> {
  readonly out: string[] = [];

  constructor(private readonly meta: StencilMetaInfo) {
    super();
  }

  private line(level: number, text: string): void {
    this.out.push(`${'  '.repeat(level)}${text}`);
  }

  override visitStencil(stencil: Iir.Stencil, level: number): void {
    const attrs = attrNames(stencil.attributes);
    this.line(level, `stencil ${stencil.id}${attrs.length > 0 ? ` [${attrs.join(', ')}]` : ''}`);
    super.visitStencil(stencil, level + 1);
  }

  override visitMultiStage(ms: Iir.MultiStage, level: number): void {
    this.line(level, `multistage ${ms.id} ${loopOrderName(ms.loopOrder)}`);
    super.visitMultiStage(ms, level + 1);
  }

  override visitStage(stage: Iir.Stage, level: number): void {
    this.line(level, `stage ${stage.id}`);
    super.visitStage(stage, level + 1);
  }

  override visitDoMethod(dm: Iir.DoMethod, level: number): void {
    this.line(level, `do ${dm.id} ${intervalToString(dm.interval)}`);
    super.visitDoMethod(dm, level + 1);
  }

  override visitStatementAccessPair(pair: Iir.StatementAccessPair, level: number): void {
    this.line(level, formatStmt(pair.statement, level));
    const writes = formatAccessMap(this.meta, pair.callerAccesses.writes);
    const reads = formatAccessMap(this.meta, pair.callerAccesses.reads);
    if (writes || reads) this.line(level + 1, `// writes: ${writes || '-'}  reads: ${reads || '-'}`);
  }
}

/** Human-readable dump of the IIR tree and the main metadata tables. */
export function formatInstantiation(inst: StencilInstantiation): string {
  const meta = inst.metadata;
  const visitor = new PrettyIirVisitor(meta);
  visitor.out.push(`stencil-instantiation ${meta.stencilName || '<anonymous>'}${meta.fileName ? ` (${meta.fileName})` : ''}`);

  const fields = meta.fieldIds().map(id => {
    const tags = [meta.isApiField(id) ? 'api' : '', meta.isTemporaryField(id) ? 'tmp' : ''].filter(Boolean);
    return `${meta.getNameFromAccessId(id)}#${id}${tags.length > 0 ? `(${tags.join(',')})` : ''}`;
  });
  if (fields.length > 0) visitor.out.push(`  fields: ${fields.join(' ')}`);
  for (const [name, value] of meta.globalVariables()) visitor.out.push(`  global ${name}: ${globalValueToString(value)}`);

  visitor.visitIR(inst.ir, 1);

  if (meta.stencilDescStatements.length > 0) {
    visitor.out.push('  flow:');
    for (const desc of meta.stencilDescStatements) {
      const trace = desc.stackTrace.map(call => call.callee).join(' > ');
      visitor.out.push(`    ${formatStmt(desc.stmt, 2)}${trace ? `  // via ${trace}` : ''}`);
    }
  }
  return visitor.out.join('\n');
}
