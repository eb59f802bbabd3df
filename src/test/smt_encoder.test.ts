import assert from "assert";

import { SMTArraySort, SMTBitVectorSort, SMTBoolSort, SMTExpression, SMTFunctionSort, SMTIntSort, SMTTupleSort } from "../tooling/smtlib/smt_exp";
import { SMTLib2Encoder } from "../tooling/smtlib/smt_encoder";

const PREAMBLE = "(set-option :produce-models true)\n(set-logic ALL)\n";

function linesStartingWith(script: string, prefix: string): string[] {
    return script.split("\n").filter((line) => line.startsWith(prefix));
}

describe("preamble", () => {
    it("writes model production and logic", () => {
        expect(new SMTLib2Encoder(undefined).fullScript()).toStrictEqual(PREAMBLE);
    });

    it("writes the timeout hint when configured", () => {
        expect(new SMTLib2Encoder(500).fullScript()).toStrictEqual(
            "(set-option :produce-models true)\n(set-option :timeout 500)\n(set-logic ALL)\n",
        );
    });

    it("reset drops declarations and scopes", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.push();
        enc.declareVariable("x", new SMTIntSort(true));
        enc.reset();

        expect(enc.scopeDepth).toStrictEqual(1);
        expect(enc.isDeclared("x")).toStrictEqual(false);

        enc.declareVariable("x", new SMTIntSort(true));
        expect(enc.fullScript()).toStrictEqual(PREAMBLE + "(declare-fun |x| () Int)\n");
    });
});

describe("scopes", () => {
    it("balances push and pop", () => {
        const enc = new SMTLib2Encoder(undefined);
        for(let i = 0; i < 3; ++i) {
            enc.push();
        }
        expect(enc.scopeDepth).toStrictEqual(4);

        for(let i = 0; i < 3; ++i) {
            enc.pop();
        }
        expect(enc.scopeDepth).toStrictEqual(1);
    });

    it("refuses to pop the last scope", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(() => enc.pop()).toThrow(assert.AssertionError);
    });

    it("pop erases text written after the push", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.push();
        enc.declareVariable("x", new SMTIntSort(true));
        expect(enc.fullScript()).toStrictEqual(PREAMBLE + "\n(declare-fun |x| () Int)\n");

        enc.pop();
        expect(enc.fullScript()).toStrictEqual(PREAMBLE);
    });

    it("keeps the declaration table across a pop", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.push();
        enc.declareVariable("x", new SMTIntSort(true));
        enc.pop();

        expect(enc.isDeclared("x")).toStrictEqual(true);
        enc.declareVariable("x", new SMTIntSort(true));
        expect(enc.fullScript()).toStrictEqual(PREAMBLE);
    });
});

describe("declarations", () => {
    it("declares a variable once", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.declareVariable("x", new SMTIntSort(true));
        enc.declareVariable("x", new SMTIntSort(true));
        enc.declareVariable("x", new SMTBoolSort());

        expect(linesStartingWith(enc.fullScript(), "(declare-fun |x|")).toStrictEqual(["(declare-fun |x| () Int)"]);
        expect(enc.declaredSort("x")?.kind).toStrictEqual("int");
    });

    it("routes function sorts to function declarations", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.declareVariable("f", new SMTFunctionSort([new SMTIntSort(true), new SMTBoolSort()], new SMTIntSort(true)));

        expect(enc.fullScript()).toStrictEqual(PREAMBLE + "(declare-fun |f| (Int Bool ) Int)\n");
    });

    it("declares a nullary function with an empty domain", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.declareFunction("c", new SMTFunctionSort([], new SMTBoolSort()));

        expect(enc.fullScript()).toStrictEqual(PREAMBLE + "(declare-fun |c| () Bool)\n");
    });

    it("rejects non-function sorts in declareFunction", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(() => enc.declareFunction("x", new SMTIntSort(true))).toThrow(assert.AssertionError);
    });

    it("writes assertions into the top scope", () => {
        const enc = new SMTLib2Encoder(undefined);
        enc.declareVariable("x", new SMTIntSort(true));
        enc.addAssertion(SMTExpression.makeEq(SMTExpression.makeConst("|x|"), SMTExpression.makeConst("3")));

        expect(enc.fullScript()).toStrictEqual(PREAMBLE + "(declare-fun |x| () Int)\n(assert (= |x| 3))\n");
    });
});

describe("sorts", () => {
    it("renders primitive sorts", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(enc.toSmtLibSort(new SMTIntSort(false))).toStrictEqual("Int");
        expect(enc.toSmtLibSort(new SMTBoolSort())).toStrictEqual("Bool");
        expect(enc.toSmtLibSort(new SMTBitVectorSort(8))).toStrictEqual("(_ BitVec 8)");
    });

    it("renders nested array sorts", () => {
        const enc = new SMTLib2Encoder(undefined);
        const arr = new SMTArraySort(new SMTIntSort(true), new SMTArraySort(new SMTBoolSort(), new SMTBitVectorSort(16)));

        expect(enc.toSmtLibSort(arr)).toStrictEqual("(Array Int (Array Bool (_ BitVec 16)))");
    });

    it("rejects sorts without a standalone name", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(() => enc.toSmtLibSort(new SMTFunctionSort([], new SMTIntSort(true)))).toThrow(assert.AssertionError);
    });

    it("checks tuple member and component counts", () => {
        expect(() => new SMTTupleSort("bad", ["a", "b"], [new SMTIntSort(true)])).toThrow(assert.AssertionError);
    });
});

describe("tuple sorts", () => {
    const DECL = "(declare-datatypes ((|pair| 0)) (((|pair| (|fst| Int) (|snd| Bool)))))";

    it("declares the datatype on first use only", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);

        expect(enc.toSmtLibSort(pair)).toStrictEqual("|pair|");
        expect(enc.toSmtLibSort(pair)).toStrictEqual("|pair|");
        expect(linesStartingWith(enc.fullScript(), "(declare-datatypes")).toStrictEqual([DECL]);
    });

    it("declares the datatype before the variable using it", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);
        enc.declareVariable("p", pair);

        expect(enc.fullScript()).toStrictEqual(PREAMBLE + DECL + "\n(declare-fun |p| () |pair|)\n");
    });

    it("does not redeclare a tuple name for a second sort instance", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair1 = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);
        const pair2 = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);

        expect(enc.toSmtLibSort(pair1)).toStrictEqual("|pair|");
        expect(enc.toSmtLibSort(pair2)).toStrictEqual("|pair|");
        expect(linesStartingWith(enc.fullScript(), "(declare-datatypes")).toHaveLength(1);
    });

    it("keeps the registry entry after the declaring scope is popped", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);

        enc.push();
        enc.toSmtLibSort(pair);
        enc.pop();

        expect(enc.toSmtLibSort(pair)).toStrictEqual("|pair|");
        expect(enc.fullScript()).toStrictEqual(PREAMBLE);
    });

    it("declares nested tuple components first", () => {
        const enc = new SMTLib2Encoder(undefined);
        const inner = new SMTTupleSort("inner", ["v"], [new SMTIntSort(true)]);
        const outer = new SMTTupleSort("outer", ["i"], [inner]);

        expect(enc.toSmtLibSort(outer)).toStrictEqual("|outer|");
        expect(linesStartingWith(enc.fullScript(), "(declare-datatypes")).toStrictEqual([
            "(declare-datatypes ((|inner| 0)) (((|inner| (|v| Int)))))",
            "(declare-datatypes ((|outer| 0)) (((|outer| (|i| |inner|)))))",
        ]);
    });
});

describe("expressions", () => {
    const x = SMTExpression.makeConst("|x|", new SMTBitVectorSort(8));

    it("renders leaves verbatim", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(enc.toSExpr(SMTExpression.makeConst("#b0101"))).toStrictEqual("#b0101");
    });

    it("renders applications", () => {
        const enc = new SMTLib2Encoder(undefined);
        const sum = SMTExpression.makeCall("+", [SMTExpression.makeConst("a"), SMTExpression.makeConst("1")]);
        const exp = SMTExpression.makeAndOf(SMTExpression.makeCall(">", [sum, SMTExpression.makeConst("0")]), SMTExpression.makeNot(SMTExpression.makeConst("b")));

        expect(enc.toSExpr(exp)).toStrictEqual("(and (> (+ a 1) 0) (not b))");
    });

    it("applies two's complement in int2bv", () => {
        const enc = new SMTLib2Encoder(undefined);
        const exp = SMTExpression.makeInt2BV(SMTExpression.makeConst("5"), 8);

        expect(enc.toSExpr(exp)).toStrictEqual("(ite (>= 5 0) ((_ int2bv 8) 5) (bvneg ((_ int2bv 8) (- 5))))");
    });

    it("renders unsigned bv2int as bv2nat", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(enc.toSExpr(SMTExpression.makeBV2Int(x, false))).toStrictEqual("(bv2nat |x|)");
    });

    it("checks the sign bit in signed bv2int", () => {
        const enc = new SMTLib2Encoder(undefined);
        expect(enc.toSExpr(SMTExpression.makeBV2Int(x, true))).toStrictEqual(
            "(ite (= ((_ extract 7 7) |x|) #b0) (bv2nat |x|) (- (bv2nat (bvneg |x|))))",
        );
    });

    it("requires an Int sort on bv2int", () => {
        const enc = new SMTLib2Encoder(undefined);
        const exp = SMTExpression.makeCall("bv2int", [x], new SMTBoolSort());

        expect(() => enc.toSExpr(exp)).toThrow(assert.AssertionError);
    });

    it("renders const_array with its array sort", () => {
        const enc = new SMTLib2Encoder(undefined);
        const arr = new SMTArraySort(new SMTIntSort(true), new SMTIntSort(true));

        expect(enc.toSExpr(SMTExpression.makeConstArray(arr, SMTExpression.makeConst("0")))).toStrictEqual("((as const (Array Int Int)) 0)");
    });

    it("renders tuple access and construction", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);
        const p = SMTExpression.makeConst("|p|", pair);

        expect(enc.toSExpr(SMTExpression.makeTupleGet(p, 1))).toStrictEqual("(|snd| |p|)");
        expect(SMTExpression.makeTupleGet(p, 1).sort?.kind).toStrictEqual("bool");
        expect(enc.toSExpr(SMTExpression.makeTupleConstructor(pair, [SMTExpression.makeConst("1"), SMTExpression.makeConst("true")]))).toStrictEqual("(|pair| 1 true)");
    });

    it("rejects an out of range tuple index", () => {
        const enc = new SMTLib2Encoder(undefined);
        const pair = new SMTTupleSort("pair", ["fst", "snd"], [new SMTIntSort(true), new SMTBoolSort()]);

        expect(() => enc.toSExpr(SMTExpression.makeTupleGet(SMTExpression.makeConst("|p|", pair), 2))).toThrow(assert.AssertionError);
    });
});
