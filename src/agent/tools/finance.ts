import { z } from 'zod';
import { Tool, ToolParameters } from './base';
import { errorMessage } from '../../errors';

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(value: number): string {
  return `$${amountFormat.format(value)}`;
}

const CompoundInterestArgs = z.object({
  principal: z.coerce.number(),
  rate: z.coerce.number(),
  time: z.coerce.number(),
  compounds_per_year: z.coerce.number().int().default(12),
});

type CompoundInterestParams = z.infer<typeof CompoundInterestArgs>;

/** A = P(1 + r/n)^(nt), with `rate` given as a percentage. */
export class CompoundInterestTool extends Tool<CompoundInterestParams> {
  get name() { return 'calculate_compound_interest'; }
  get description() {
    return 'Calculate compound interest for savings or investment scenarios. Useful for showing customers potential growth of their savings.';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        principal: { type: 'number', description: 'Initial investment amount' },
        rate: { type: 'number', description: 'Annual interest rate as a percentage (e.g., 5 for 5%)' },
        time: { type: 'number', description: 'Time period in years' },
        compounds_per_year: { type: 'integer', description: 'Number of times interest compounds per year (default: 12 for monthly)', minimum: 1 },
      },
      required: ['principal', 'rate', 'time'],
    };
  }

  protected get argsSchema() {
    return CompoundInterestArgs;
  }

  async execute(params: CompoundInterestParams): Promise<string> {
    const { principal, rate, time, compounds_per_year: n } = params;
    if (principal <= 0 || time <= 0) {
      return 'Error: Principal and time must be positive numbers.';
    }
    if (n <= 0) {
      return 'Error: Compounding frequency must be a positive whole number.';
    }

    const amount = principal * Math.pow(1 + rate / 100 / n, n * time);
    const interest = amount - principal;

    return [
      'Compound Interest Calculation:',
      `- Principal Amount: ${formatCurrency(principal)}`,
      `- Annual Interest Rate: ${rate}%`,
      `- Time Period: ${time} years`,
      `- Compounding Frequency: ${n} times per year`,
      '',
      `Final Amount: ${formatCurrency(amount)}`,
      `Interest Earned: ${formatCurrency(interest)}`,
      `Total Return: ${((interest / principal) * 100).toFixed(2)}%`,
    ].join('\n');
  }
}

const InvestmentReturnsArgs = z.object({
  initial: z.coerce.number(),
  final: z.coerce.number(),
  years: z.coerce.number(),
});

type InvestmentReturnsParams = z.infer<typeof InvestmentReturnsArgs>;

export class InvestmentReturnsTool extends Tool<InvestmentReturnsParams> {
  get name() { return 'analyze_investment_returns'; }
  get description() {
    return 'Analyze investment returns including total return, percentage gain, and compound annual growth rate (CAGR).';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        initial: { type: 'number', description: 'Initial investment amount' },
        final: { type: 'number', description: 'Final investment value' },
        years: { type: 'number', description: 'Investment period in years' },
      },
      required: ['initial', 'final', 'years'],
    };
  }

  protected get argsSchema() {
    return InvestmentReturnsArgs;
  }

  async execute(params: InvestmentReturnsParams): Promise<string> {
    const { initial, final, years } = params;
    if (initial <= 0 || years <= 0) {
      return 'Error: Initial investment and years must be positive numbers.';
    }

    const totalReturn = final - initial;
    const totalReturnPct = (totalReturn / initial) * 100;
    const cagr = (Math.pow(final / initial, 1 / years) - 1) * 100;

    return [
      'Investment Return Analysis:',
      `- Initial Investment: ${formatCurrency(initial)}`,
      `- Final Value: ${formatCurrency(final)}`,
      `- Time Period: ${years} years`,
      '',
      `Total Return: ${formatCurrency(totalReturn)} (${totalReturnPct.toFixed(2)}%)`,
      `Compound Annual Growth Rate (CAGR): ${cagr.toFixed(2)}%`,
      `Average Annual Return: ${(totalReturnPct / years).toFixed(2)}% per year`,
    ].join('\n');
  }
}

// --- arithmetic expressions ---

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'op'; value: '+' | '-' | '*' | '/' | '//' | '%' | '**' }
  | { kind: 'paren'; value: '(' | ')' };

const ALLOWED_EXPRESSION = /^[0-9+\-*/%().\s]*$/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[0-9.]/.test(ch)) {
      let end = i;
      while (end < expression.length && /[0-9.]/.test(expression[end])) end++;
      const literal = expression.slice(i, end);
      if (!/^(\d+\.?\d*|\.\d+)$/.test(literal)) {
        throw new SyntaxError(`Invalid number '${literal}'`);
      }
      tokens.push({ kind: 'number', value: Number(literal) });
      i = end;
      continue;
    }
    if (ch === '*' && expression[i + 1] === '*') {
      tokens.push({ kind: 'op', value: '**' });
      i += 2;
      continue;
    }
    if (ch === '/' && expression[i + 1] === '/') {
      tokens.push({ kind: 'op', value: '//' });
      i += 2;
      continue;
    }
    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%') {
      tokens.push({ kind: 'op', value: ch });
    } else if (ch === '(' || ch === ')') {
      tokens.push({ kind: 'paren', value: ch });
    } else {
      throw new SyntaxError(`Unexpected character '${ch}'`);
    }
    i++;
  }
  return tokens;
}

/**
 * Recursive-descent evaluator.
 *
 *   expr  := term (('+' | '-') term)*
 *   term  := unary (('*' | '/' | '//' | '%') unary)*
 *   unary := ('+' | '-') unary | power
 *   power := atom ('**' unary)?
 *   atom  := number | '(' expr ')'
 *
 * `**` is right-associative and binds tighter than a leading sign, so
 * `-2 ** 2` is -4. `//` floors the quotient and `%` takes the sign of the
 * divisor.
 */
class ExpressionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new SyntaxError('Empty expression');
    }
    const value = this.expr();
    const trailing = this.tokens[this.pos];
    if (trailing) {
      throw new SyntaxError(`Unexpected '${trailing.value}'`);
    }
    return value;
  }

  private peekOp(...ops: string[]): string | undefined {
    const token = this.tokens[this.pos];
    if (token && token.kind === 'op' && ops.includes(token.value)) {
      return token.value;
    }
    return undefined;
  }

  private expr(): number {
    let value = this.term();
    for (let op = this.peekOp('+', '-'); op; op = this.peekOp('+', '-')) {
      this.pos++;
      const rhs = this.term();
      value = op === '+' ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp('*', '/', '//', '%'); op; op = this.peekOp('*', '/', '//', '%')) {
      this.pos++;
      const rhs = this.unary();
      if (op === '*') {
        value *= rhs;
        continue;
      }
      if (rhs === 0) {
        throw new RangeError(op === '%' ? 'modulo by zero' : 'division by zero');
      }
      if (op === '/') {
        value /= rhs;
      } else if (op === '//') {
        value = Math.floor(value / rhs);
      } else {
        value -= rhs * Math.floor(value / rhs);
      }
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp('+', '-');
    if (op) {
      this.pos++;
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): number {
    const base = this.atom();
    if (this.peekOp('**')) {
      this.pos++;
      const exponent = this.unary();
      if (base === 0 && exponent < 0) {
        throw new RangeError('zero cannot be raised to a negative power');
      }
      return Math.pow(base, exponent);
    }
    return base;
  }

  private atom(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new SyntaxError('Unexpected end of expression');
    }
    if (token.kind === 'number') {
      this.pos++;
      return token.value;
    }
    if (token.kind === 'paren' && token.value === '(') {
      this.pos++;
      const value = this.expr();
      const closing = this.tokens[this.pos];
      if (!closing || closing.kind !== 'paren' || closing.value !== ')') {
        throw new SyntaxError("Missing closing ')'");
      }
      this.pos++;
      return value;
    }
    throw new SyntaxError(`Unexpected '${token.value}'`);
  }
}

export function evaluateExpression(expression: string): number {
  const value = new ExpressionParser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) {
    throw new RangeError('result is not a finite number');
  }
  return value;
}

const CalculateArgs = z.object({
  expression: z.string().min(1),
});

type CalculateParams = z.infer<typeof CalculateArgs>;

export class CalculateTool extends Tool<CalculateParams> {
  get name() { return 'calculate'; }
  get description() {
    return 'Evaluate an arithmetic expression. Supports +, -, *, /, // (floor division), % (modulo), ** (power) and parentheses.';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        expression: { type: 'string', description: 'Arithmetic expression, e.g. (1500 * 0.04) / 12' },
      },
      required: ['expression'],
    };
  }

  protected get argsSchema() {
    return CalculateArgs;
  }

  async execute(params: CalculateParams): Promise<string> {
    if (!ALLOWED_EXPRESSION.test(params.expression)) {
      return 'Error: Expression contains invalid characters. Only numbers and operators (+, -, *, /, **, %, parentheses) are allowed.';
    }
    try {
      return `Result: ${evaluateExpression(params.expression)}`;
    } catch (err) {
      return `Error in calculation: ${errorMessage(err)}`;
    }
  }
}
