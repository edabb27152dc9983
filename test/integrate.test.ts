import { describe, expect, test } from "vitest";
import { parseExpression, type ASTNode } from "../src/math/ast.ts";
import { FunctionExpression } from "../src/fourier/expression.ts";
import { buildGeneralTerm, createGeneralTerm } from "../src/fourier/general-term.ts";
import {
  asAffine,
  ClosedFormIntegrator,
  expandPiecewise,
  multiplyPolys,
  TrapezoidIntegrator,
} from "../src/fourier/integrate.ts";
import { linspace, trapezoid } from "../src/fourier/sampling.ts";

const PI = Math.PI;

function ast(text: string): ASTNode {
  const result = parseExpression(text);
  if (!result.ast) throw new Error(result.error);
  return result.ast;
}

function closedForm(text: string, L = PI): ClosedFormIntegrator {
  const integrator = ClosedFormIntegrator.fromAST(ast(text), L, 4096);
  if (!integrator) throw new Error(`${text} is not integrable`);
  return integrator;
}

describe("expandPiecewise", () => {
  test("polynomials expand to one piece", () => {
    expect(expandPiecewise(ast("x**2"), PI, 4096)).toEqual([
      { start: -PI, end: PI, poly: [{ coeff: 1, power: 2, omega: 0, phase: 0 }] },
    ]);
  });

  test("integer powers multiply out", () => {
    const pieces = expandPiecewise(ast("(x + 1)**2"), PI, 4096);
    expect(pieces?.[0].poly).toHaveLength(3);
  });

  test("abs splits at the root of its argument", () => {
    const pieces = expandPiecewise(ast("abs(x)"), PI, 4096);
    expect(pieces).toHaveLength(2);
    expect(pieces?.[0].start).toBe(-PI);
    expect(pieces?.[0].end).toBeCloseTo(0, 12);
    expect(pieces?.[1].end).toBe(PI);
    expect(pieces?.[0].poly).toEqual([{ coeff: -1, power: 1, omega: 0, phase: 0 }]);
    expect(pieces?.[1].poly).toEqual([{ coeff: 1, power: 1, omega: 0, phase: 0 }]);
  });

  test("constant subexpressions fold through any function", () => {
    const [t] = expandPiecewise(ast("exp(1) * x"), PI, 4096)?.[0].poly ?? [];
    expect(t.power).toBe(1);
    expect(t.coeff).toBeCloseTo(Math.E, 12);
  });

  test.each(["exp(x)", "sin(x**2)", "x**0.5", "tan(x)", "1/x", "x // 2", "floor(x)"])("%s is rejected", (text) => {
    expect(expandPiecewise(ast(text), PI, 4096)).toBeNull();
  });

  test("term budget overflow is rejected", () => {
    expect(expandPiecewise(ast("(sin(x) + sin(2*x) + sin(3*x))**4"), PI, 5)).toBeNull();
  });
});

describe("trigonometric polynomial algebra", () => {
  test("cos·cos folds to sum and difference frequencies", () => {
    const product = multiplyPolys(
      [{ coeff: 1, power: 0, omega: 1, phase: 0 }],
      [{ coeff: 1, power: 0, omega: 1, phase: 0 }],
    );
    expect(product).toEqual([
      { coeff: 0.5, power: 0, omega: 2, phase: 0 },
      { coeff: 0.5, power: 0, omega: 0, phase: 0 },
    ]);
  });

  test("affine detection", () => {
    expect(
      asAffine([
        { coeff: 2, power: 1, omega: 0, phase: 0 },
        { coeff: -1, power: 0, omega: 0, phase: 0 },
      ]),
    ).toEqual([2, -1]);
    expect(asAffine([{ coeff: 1, power: 2, omega: 0, phase: 0 }])).toBeNull();
  });
});

describe("ClosedFormIntegrator", () => {
  test("∫ x·sin(x) over [-π, π] is 2π", () => {
    expect(closedForm("x").integrate(1, -PI / 2)).toBeCloseTo(2 * PI, 10);
  });

  test("∫ x² over [-π, π] is 2π³/3", () => {
    expect(closedForm("x**2").integrate(0, 0)).toBeCloseTo((2 * PI ** 3) / 3, 10);
  });

  test("∫ sin²(x) over [-π, π] is π", () => {
    expect(closedForm("sin(x)*sin(x)").integrate(0, 0)).toBeCloseTo(PI, 10);
  });

  test("∫ |x|·cos(x) over [-π, π] is -4", () => {
    expect(closedForm("abs(x)").integrate(1, 0)).toBeCloseTo(-4, 10);
  });
});

describe("TrapezoidIntegrator", () => {
  test("approximates ∫ x² over [-π, π]", () => {
    const integrator = new TrapezoidIntegrator(FunctionExpression.parse("x**2"), PI, 2000);
    expect(integrator.integrate(0, 0)).toBeCloseTo((2 * PI ** 3) / 3, 3);
  });
});

describe("sampling helpers", () => {
  test("linspace includes both ends", () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(linspace(0, 1, 1)).toEqual([0]);
    expect(linspace(0, 1, 0)).toEqual([]);
  });

  test("trapezoid", () => {
    expect(trapezoid([0, 1, 2], [0, 1, 2])).toBe(2);
  });
});

describe("general-term formulas", () => {
  test("bₙ of x on [-π, π]", () => {
    const formula = buildGeneralTerm(closedForm("x").pieces, PI, "sin");
    expect(formula?.text).toBe("-(2 * (-1) ** n / n)");
    expect(formula?.evaluate(1)).toBeCloseTo(2, 12);
    expect(formula?.evaluate(2)).toBeCloseTo(-1, 12);
  });

  test("aₙ of x vanishes", () => {
    expect(buildGeneralTerm(closedForm("x").pieces, PI, "cos")?.text).toBe("0");
  });

  test("aₙ of x² on [-π, π]", () => {
    const formula = buildGeneralTerm(closedForm("x**2").pieces, PI, "cos");
    expect(formula?.text).toBe("4 * (-1) ** n / n ** 2");
    expect(formula?.evaluate(3)).toBeCloseTo(-4 / 9, 12);
  });

  test("bₙ of sign(x) is 4/(nπ) on odd n", () => {
    const formula = buildGeneralTerm(closedForm("sign(x)").pieces, PI, "sin");
    expect(formula?.text).toBe("0.636619772368 / n - 0.636619772368 * (-1) ** n / n");
    expect(formula?.evaluate(1)).toBeCloseTo(4 / PI, 12);
    expect(formula?.evaluate(2)).toBeCloseTo(0, 12);
  });

  test("formula text parses back in n", () => {
    const formula = buildGeneralTerm(closedForm("x**2").pieces, PI, "cos");
    expect(parseExpression(formula?.text ?? "", { variables: ["n"] }).ast).not.toBeNull();
  });

  test("unavailable for oscillating terms or off-grid breakpoints", () => {
    expect(buildGeneralTerm(closedForm("x*cos(x)").pieces, PI, "cos")).toBeNull();
    expect(buildGeneralTerm(closedForm("abs(x - 1)").pieces, PI, "cos")).toBeNull();
  });

  test("empty formula is zero", () => {
    const zero = createGeneralTerm([]);
    expect(zero.text).toBe("0");
    expect(zero.evaluate(3)).toBe(0);
  });
});
