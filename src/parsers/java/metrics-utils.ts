import Parser from 'tree-sitter';
import { DECISION_NODE_TYPES } from './types';

export interface LineMetrics {
  total_lines: number;
  code_lines: number;
}

export function computeLineMetrics(content: string): LineMetrics {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  return {
    total_lines: lines.length,
    code_lines: lines.filter(line => {
      const trimmed = line.trim();
      return trimmed.length > 0 && !trimmed.startsWith('//');
    }).length,
  };
}

/**
 * 1 + branch points: conditionals, loops, catch clauses, ternaries, case labels and
 * short-circuit operators. Nested type bodies count toward their own methods only.
 */
export function computeCyclomaticComplexity(methodNode: Parser.SyntaxNode): number {
  const body = methodNode.childForFieldName('body');
  if (!body) return 1;

  let complexity = 1;

  const traverse = (node: Parser.SyntaxNode) => {
    if (node.type === 'switch_label') {
      if (node.child(0)?.type === 'case') complexity++;
    } else if (DECISION_NODE_TYPES.has(node.type)) {
      complexity++;
    } else if (node.type === 'binary_expression') {
      const operator = node.childForFieldName('operator');
      if (operator && (operator.type === '&&' || operator.type === '||')) {
        complexity++;
      }
    }

    for (const child of node.children) {
      if (child.type === 'class_body' || child.type === 'interface_body') continue;
      traverse(child);
    }
  };

  traverse(body);
  return complexity;
}
