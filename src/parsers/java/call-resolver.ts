import { CallKind, CallRecord, CONTROL_FLOW_KEYWORDS } from './types';
import { resolveTypePackage } from './signature-utils';

const CALL_PATTERN = /(?:(\w+)\.)?(\w+)\s*\(/g;
const CONSTRUCTOR_PATTERN =
  /\bnew\s+([A-Z]\w*(?:\.[A-Z]\w*)*|(?:[a-z_]\w*\.)+[A-Z]\w*)\s*(?:<(?:[^<>]|<[^<>]*>)*>)?\s*\(/g;

/**
 * Replace comments and string/char literals with spaces, keeping offsets and newlines
 */
export function blankCommentsAndLiterals(code: string): string {
  let result = '';
  let i = 0;

  while (i < code.length) {
    const char = code[i];
    const next = code[i + 1];

    if (char === '/' && next === '/') {
      while (i < code.length && code[i] !== '\n') {
        result += ' ';
        i++;
      }
    } else if (char === '/' && next === '*') {
      const end = code.indexOf('*/', i + 2);
      const stop = end === -1 ? code.length : end + 2;
      for (; i < stop; i++) {
        result += code[i] === '\n' ? '\n' : ' ';
      }
    } else if (char === '"' && code.startsWith('"""', i)) {
      const end = code.indexOf('"""', i + 3);
      const stop = end === -1 ? code.length : end + 3;
      for (; i < stop; i++) {
        result += code[i] === '\n' ? '\n' : ' ';
      }
    } else if (char === '"' || char === "'") {
      result += ' ';
      i++;
      while (i < code.length && code[i] !== char && code[i] !== '\n') {
        if (code[i] === '\\') {
          result += ' ';
          i++;
        }
        if (i < code.length) {
          result += ' ';
          i++;
        }
      }
      if (i < code.length && code[i] === char) {
        result += ' ';
        i++;
      }
    } else {
      result += char;
      i++;
    }
  }

  return result;
}

/**
 * Map a call qualifier to the target class hint and call kind
 */
export function determineCallTarget(
  qualifier: string | undefined,
  enclosingType: string
): { targetClass: string; callType: CallKind } {
  if (qualifier === undefined) {
    return { targetClass: enclosingType, callType: CallKind.SAME_CLASS };
  }
  if (qualifier === 'this') {
    return { targetClass: enclosingType, callType: CallKind.THIS };
  }
  if (qualifier === 'super') {
    return { targetClass: 'super', callType: CallKind.SUPER };
  }
  if (/^[A-Z]/.test(qualifier)) {
    return { targetClass: qualifier, callType: CallKind.STATIC };
  }
  return { targetClass: qualifier, callType: CallKind.INSTANCE };
}

/**
 * Syntactic call extraction from a method body. Qualifiers are not type-checked:
 * `foo.bar()` hints class `foo` whatever `foo` actually refers to.
 */
export function extractMethodCalls(
  bodyCode: string,
  enclosingType: string,
  importedTypes: ReadonlyMap<string, string> = new Map()
): CallRecord[] {
  if (!bodyCode) return [];

  const code = blankCommentsAndLiterals(bodyCode);
  const calls: CallRecord[] = [];

  for (const match of code.matchAll(CALL_PATTERN)) {
    const qualifier: string | undefined = match[1];
    const methodName = match[2];
    const start = match.index ?? 0;

    if (CONTROL_FLOW_KEYWORDS.has(methodName.toLowerCase())) continue;
    if (/^[A-Z]/.test(methodName)) continue;
    // `foo().bar()`: the receiver is an expression, not a name
    if (qualifier === undefined && isPrecededByDot(code, start)) continue;

    const { targetClass, callType } = determineCallTarget(qualifier, enclosingType);
    const call: CallRecord = {
      method_name: methodName,
      target_class: targetClass,
      call_type: callType,
    };
    if (qualifier !== undefined) {
      call.qualifier = qualifier;
    }
    calls.push(call);
  }

  for (const match of code.matchAll(CONSTRUCTOR_PATTERN)) {
    const typeText = match[1];
    const segments = typeText.split('.');
    const simpleName = segments[segments.length - 1];
    const call: CallRecord = {
      method_name: simpleName,
      target_class: simpleName,
      call_type: CallKind.CONSTRUCTOR,
    };
    const targetPackage = resolveTypePackage(typeText, importedTypes);
    if (targetPackage) {
      call.target_package = targetPackage;
    }
    calls.push(call);
  }

  return calls;
}

function isPrecededByDot(code: string, start: number): boolean {
  let i = start - 1;
  while (i >= 0 && /\s/.test(code[i])) i--;
  return i >= 0 && code[i] === '.';
}
