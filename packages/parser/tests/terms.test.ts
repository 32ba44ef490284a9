import { describe, expect, test } from "vitest";
import { parseExpression, ParseError } from "../src/index";

const node = (source: string) => parseExpression(source).value.value;

describe("term", () => {
  test("parses number literals with their representation", () => {
    expect(node("42")).toEqual({
      kind: "Literal",
      literal: { kind: "IntNum", value: 42n, representation: "DecimalInt" },
    });
    expect(node("0x1F")).toEqual({
      kind: "Literal",
      literal: { kind: "IntNum", value: 31n, representation: "HexadecimalInt" },
    });
    expect(node("1.5")).toEqual({
      kind: "Literal",
      literal: { kind: "FloatNum", value: 1.5, representation: "DecimalFloat" },
    });
    expect(node("2e3")).toEqual({
      kind: "Literal",
      literal: {
        kind: "FloatNum",
        value: 2000,
        representation: "ExponentFloat",
      },
    });
  });

  test("integer literals keep every digit", () => {
    expect(node("9007199254740993")).toEqual({
      kind: "Literal",
      literal: {
        kind: "IntNum",
        value: 9007199254740993n,
        representation: "DecimalInt",
      },
    });
    expect(node("0x7FFFFFFFFFFFFFFF")).toEqual({
      kind: "Literal",
      literal: {
        kind: "IntNum",
        value: 9223372036854775807n,
        representation: "HexadecimalInt",
      },
    });
  });

  test("parses strings and chars keeping escapes as written", () => {
    expect(node('"a\\tb"')).toEqual({
      kind: "Literal",
      literal: { kind: "Str", value: "a\\tb", multiline: false },
    });
    expect(node('"""one\ntwo"""')).toEqual({
      kind: "Literal",
      literal: { kind: "Str", value: "one\ntwo", multiline: true },
    });
    expect(node("'c'")).toEqual({
      kind: "Literal",
      literal: { kind: "Chr", value: "c" },
    });
  });

  test("unqualified True and False are boolean literals", () => {
    expect(node("True")).toEqual({
      kind: "Literal",
      literal: { kind: "Boolean", value: true },
    });
    expect(node("False")).toEqual({
      kind: "Literal",
      literal: { kind: "Boolean", value: false },
    });
    expect(node("Basics.True")).toEqual({
      kind: "VarExpr",
      ref: { kind: "TagRef", namespace: ["Basics"], name: "True" },
    });
  });

  test("parses qualified references", () => {
    expect(node("List.map")).toEqual({
      kind: "VarExpr",
      ref: { kind: "VarRef", namespace: ["List"], name: "map" },
    });
    expect(node("Html.Attributes.Attribute")).toEqual({
      kind: "VarExpr",
      ref: {
        kind: "TagRef",
        namespace: ["Html", "Attributes"],
        name: "Attribute",
      },
    });
  });

  test("parses record accessors and field access chains", () => {
    expect(node(".name")).toEqual({ kind: "AccessFunction", field: "name" });

    const access = parseExpression("model.user.name").value;
    expect(access.span.end.offset).toBe(15);
    expect(access.value).toMatchObject({
      kind: "Access",
      field: "name",
      record: {
        value: {
          kind: "Access",
          field: "user",
          record: { value: { kind: "VarExpr" } },
        },
      },
    });
  });

  test("a minus written against a term is negation", () => {
    expect(node("-x")).toMatchObject({
      kind: "Unary",
      operator: "Negative",
      operand: { value: { kind: "VarExpr", ref: { name: "x" } } },
    });
  });

  test("parses the forms that start with a parenthesis", () => {
    expect(node("(+)")).toEqual({
      kind: "VarExpr",
      ref: { kind: "OpRef", symbol: "+" },
    });
    expect(node("(,,)")).toEqual({ kind: "TupleFunction", arity: 3 });
    expect(node("()")).toEqual({ kind: "Unit", comments: [] });
    expect(node("( {- c -} )")).toEqual({
      kind: "Unit",
      comments: [{ kind: "BlockComment", lines: [" c "] }],
    });
    expect(node("(a)")).toMatchObject({
      kind: "Parens",
      expression: { before: [], value: { value: { kind: "VarExpr" } }, after: [] },
    });
  });

  test("tuples record whether they span several lines", () => {
    expect(node("(a, b)")).toMatchObject({ kind: "Tuple", multiline: false });
    expect(node("(a,\n b)")).toMatchObject({ kind: "Tuple", multiline: true });
    const tuple = node("(1,2)");
    expect(tuple.kind).toBe("Tuple");
    if (tuple.kind === "Tuple") {
      expect(tuple.elements.map((element) => element.value.value.kind)).toEqual(
        ["Literal", "Literal"]
      );
    }
  });

  test("parses lists and ranges", () => {
    expect(node("[]")).toEqual({
      kind: "ExplicitList",
      terms: [],
      trailing: [],
      multiline: false,
    });

    const list = node("[1, 2, 3]");
    expect(list).toMatchObject({ kind: "ExplicitList", multiline: false });
    if (list.kind === "ExplicitList") {
      expect(list.terms).toHaveLength(3);
    }

    expect(node("[1..n]")).toMatchObject({
      kind: "Range",
      low: { before: [], value: { value: { kind: "Literal" } }, after: [] },
      high: { value: { value: { kind: "VarExpr", ref: { name: "n" } } } },
      multiline: false,
    });
  });

  test("parses records and record updates", () => {
    expect(node("{}")).toEqual({
      kind: "Record",
      base: null,
      fields: [],
      trailing: [],
      multiline: false,
    });

    const record = node("{ a = 1, b = 2 }");
    expect(record).toMatchObject({ kind: "Record", base: null });
    if (record.kind === "Record") {
      expect(record.fields.map((field) => field.value.key.value)).toEqual([
        "a",
        "b",
      ]);
    }

    expect(node("{ r | a = 1 }")).toMatchObject({
      kind: "Record",
      base: { before: [], value: "r", after: [] },
    });
  });

  test("a field value may start with a minus right after equals", () => {
    const record = node("{a=-1}");
    expect(record.kind).toBe("Record");
    if (record.kind === "Record") {
      expect(record.fields[0]?.value.key.value).toBe("a");
      expect(record.fields[0]?.value.value.value.value).toMatchObject({
        kind: "Unary",
        operator: "Negative",
      });
    }
  });

  test("accepts a colon in place of equals in record fields", () => {
    const record = node("{ a : 1 }");
    expect(record.kind).toBe("Record");
    if (record.kind === "Record") {
      expect(record.fields[0]?.value.key.value).toBe("a");
    }
  });

  test("drops carriage returns from shader source", () => {
    expect(node("[glsl|a\r\nb|]")).toEqual({
      kind: "GLShader",
      source: "a\nb",
    });
  });

  test("keeps the comments around a whole expression", () => {
    const result = parseExpression("-- lead\nx -- trail");
    expect(result.before).toEqual([{ kind: "LineComment", text: " lead" }]);
    expect(result.after).toEqual([{ kind: "LineComment", text: " trail" }]);
  });

  test("reports a missing expression", () => {
    expect(() => parseExpression("")).toThrow(
      "Expected an expression but found end of input"
    );
    expect(() => parseExpression(")")).toThrow(ParseError);
  });
});
