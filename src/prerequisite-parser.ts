/**
 * Prerequisite Parser - Tokenizes AICC prerequisite expressions and converts
 * them to postfix form
 *
 * Grammar accepted:
 *   operands   unit identifiers; a leading '*' marks the operand optional,
 *              surrounding quotes are stripped
 *   AND        'AND' (any case), '&', ',' or ';'
 *   OR         'OR' (any case) or '|'
 *   NOT        'NOT' (any case), '!' or '~'; prefix, binds tighter than AND/OR
 *   grouping   '(' and ')'
 *
 * AND and OR share one precedence level and associate to the left, so
 * "a OR b AND c" is ((a OR b) AND c).
 */

import { PrerequisiteSyntaxError } from './errors';
import type {
  AiccPrerequisite,
  PrerequisiteGraph,
  PrerequisiteOperator,
  PrerequisiteToken
} from './types';

const KEYWORDS: Record<string, PrerequisiteOperator> = {
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT'
};

const SYMBOL_OPERATORS: Record<string, PrerequisiteOperator> = {
  '&': 'AND',
  ',': 'AND',
  ';': 'AND',
  '|': 'OR',
  '!': 'NOT',
  '~': 'NOT'
};

const PRECEDENCE: Record<PrerequisiteOperator, number> = {
  NOT: 2,
  AND: 1,
  OR: 1
};

const WHITESPACE = /\s/;

function isOperator(value: string): value is PrerequisiteOperator {
  return value === 'AND' || value === 'OR' || value === 'NOT';
}

export function tokenize(expression: string | null | undefined): PrerequisiteToken[] {
  if (expression === null || expression === undefined) {
    return [];
  }

  const tokens: PrerequisiteToken[] = [];
  let buffer = '';
  let bufferStart = 0;
  let optionalPending = false;

  const flush = (): void => {
    if (buffer.length > 0) {
      const token = createWordToken(buffer, bufferStart, optionalPending);
      if (token) {
        tokens.push(token);
      }
    }
    buffer = '';
    optionalPending = false;
  };

  for (let i = 0; i < expression.length; i++) {
    const char = expression[i];

    if (WHITESPACE.test(char)) {
      flush();
    } else if (char === '*') {
      flush();
      optionalPending = true;
    } else if (char === '(') {
      flush();
      tokens.push({ type: 'lparen', value: '(', optional: false, position: i });
    } else if (char === ')') {
      flush();
      tokens.push({ type: 'rparen', value: ')', optional: false, position: i });
    } else if (char in SYMBOL_OPERATORS) {
      flush();
      tokens.push({ type: 'operator', value: SYMBOL_OPERATORS[char], optional: false, position: i });
    } else {
      if (buffer.length === 0) {
        bufferStart = i;
      }
      buffer += char;
    }
  }

  flush();
  return tokens;
}

function createWordToken(
  word: string,
  position: number,
  optional: boolean
): PrerequisiteToken | null {
  const keyword = KEYWORDS[word.toUpperCase()];
  if (keyword) {
    return { type: 'operator', value: keyword, optional: false, position };
  }

  let value = word;
  if (value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
       (value.startsWith("'") && value.endsWith("'")))) {
    value = value.slice(1, -1).trim();
  }

  if (value.length === 0) {
    return null;
  }

  return { type: 'operand', value, optional, position };
}

/**
 * Shunting-yard conversion. Throws PrerequisiteSyntaxError on unbalanced
 * parentheses or an operator without enough operands.
 */
export function toPostfix(tokens: PrerequisiteToken[], expression = ''): PrerequisiteToken[] {
  const output: PrerequisiteToken[] = [];
  const stack: PrerequisiteToken[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'operand':
        output.push(token);
        break;

      case 'operator':
        // NOT is a prefix operator: it waits for its operand, never pops
        if (token.value !== 'NOT') {
          popWhileHigherOrEqual(token, output, stack);
        }
        stack.push(token);
        break;

      case 'lparen':
        stack.push(token);
        break;

      case 'rparen': {
        let top = stack.pop();
        while (top !== undefined && top.type !== 'lparen') {
          output.push(top);
          top = stack.pop();
        }
        if (top === undefined) {
          throw new PrerequisiteSyntaxError(
            `Unmatched ')' at position ${token.position}`,
            expression,
            token.position
          );
        }
        break;
      }
    }
  }

  let top = stack.pop();
  while (top !== undefined) {
    if (top.type === 'lparen') {
      throw new PrerequisiteSyntaxError(
        `Unmatched '(' at position ${top.position}`,
        expression,
        top.position
      );
    }
    output.push(top);
    top = stack.pop();
  }

  checkArity(output, expression);
  return output;
}

function popWhileHigherOrEqual(
  token: PrerequisiteToken,
  output: PrerequisiteToken[],
  stack: PrerequisiteToken[]
): void {
  const precedence = isOperator(token.value) ? PRECEDENCE[token.value] : 0;

  let top = stack[stack.length - 1];
  while (top !== undefined && top.type === 'operator' && isOperator(top.value) &&
         PRECEDENCE[top.value] >= precedence) {
    output.push(top);
    stack.pop();
    top = stack[stack.length - 1];
  }
}

/**
 * Evaluate the postfix sequence symbolically: every operator must find its
 * operands and exactly one value must remain.
 */
function checkArity(postfix: PrerequisiteToken[], expression: string): void {
  let depth = 0;

  for (const token of postfix) {
    if (token.type === 'operand') {
      depth++;
      continue;
    }

    const needed = token.value === 'NOT' ? 1 : 2;
    if (depth < needed) {
      throw new PrerequisiteSyntaxError(
        `Operator '${token.value}' at position ${token.position} is missing an operand`,
        expression,
        token.position
      );
    }
    depth -= needed - 1;
  }

  if (depth > 1) {
    const position = postfix.length > 0 ? postfix[postfix.length - 1].position : 0;
    throw new PrerequisiteSyntaxError(
      'Operands must be joined by AND or OR',
      expression,
      position
    );
  }
}

/**
 * Operand identifiers in first-seen order, deduplicated
 */
export function extractDependencies(tokens: PrerequisiteToken[]): string[] {
  const seen = new Set<string>();
  for (const token of tokens) {
    if (token.type === 'operand') {
      seen.add(token.value);
    }
  }
  return [...seen];
}

function extractOptional(tokens: PrerequisiteToken[]): string[] {
  const seen = new Set<string>();
  for (const token of tokens) {
    if (token.type === 'operand' && token.optional) {
      seen.add(token.value);
    }
  }
  return [...seen];
}

/**
 * Parse the prerequisite declared for one assignable unit.
 *
 * Blank or absent expressions produce an empty, mandatory prerequisite.
 * Syntax errors propagate as PrerequisiteSyntaxError.
 */
export function parsePrerequisite(
  assignableUnitId: string,
  rawExpression: string | null | undefined
): AiccPrerequisite {
  const raw = rawExpression ?? null;

  if (raw === null || raw.trim() === '') {
    return {
      assignableUnitId,
      rawExpression: raw,
      mandatory: true,
      tokens: [],
      postfixTokens: [],
      referencedAuIds: [],
      optionalAuIds: []
    };
  }

  const expression = raw.trim();
  const tokens = tokenize(expression);
  const postfix = toPostfix(tokens, expression);
  const optionalAuIds = extractOptional(tokens);

  return {
    assignableUnitId,
    rawExpression: raw,
    mandatory: optionalAuIds.length === 0,
    tokens: tokens.map(token => token.value),
    postfixTokens: postfix.map(token => token.value),
    referencedAuIds: extractDependencies(tokens),
    optionalAuIds
  };
}

/**
 * Lenient variant used for metadata: a malformed expression keeps its tokens
 * and dependencies but has no postfix form.
 */
export function parsePrerequisiteLenient(
  assignableUnitId: string,
  rawExpression: string | null | undefined
): { prerequisite: AiccPrerequisite; error: PrerequisiteSyntaxError | null } {
  try {
    return { prerequisite: parsePrerequisite(assignableUnitId, rawExpression), error: null };
  } catch (error) {
    if (!(error instanceof PrerequisiteSyntaxError)) {
      throw error;
    }

    const tokens = tokenize(rawExpression?.trim());
    const optionalAuIds = extractOptional(tokens);
    return {
      prerequisite: {
        assignableUnitId,
        rawExpression: rawExpression ?? null,
        mandatory: optionalAuIds.length === 0,
        tokens: tokens.map(token => token.value),
        postfixTokens: [],
        referencedAuIds: extractDependencies(tokens),
        optionalAuIds
      },
      error
    };
  }
}

/**
 * AU id -> direct dependencies. Units declared more than once accumulate
 * their dependencies, still first-seen and deduplicated.
 */
export function buildPrerequisiteGraph(prerequisites: AiccPrerequisite[]): PrerequisiteGraph {
  const graph: PrerequisiteGraph = {};

  for (const prerequisite of prerequisites) {
    const existing = graph[prerequisite.assignableUnitId] ?? [];
    const merged = new Set([...existing, ...prerequisite.referencedAuIds]);
    graph[prerequisite.assignableUnitId] = [...merged];
  }

  return graph;
}
