//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

class SMTIntSort {
    readonly kind = "int";
    readonly isSigned: boolean;

    constructor(isSigned: boolean) {
        this.isSigned = isSigned;
    }
}

class SMTBoolSort {
    readonly kind = "bool";
}

class SMTBitVectorSort {
    readonly kind = "bitvector";
    readonly width: number;

    constructor(width: number) {
        assert(Number.isInteger(width) && width > 0, `Invalid bitvector width ${width}`);

        this.width = width;
    }
}

class SMTArraySort {
    readonly kind = "array";
    readonly domain: SMTSort;
    readonly range: SMTSort;

    constructor(domain: SMTSort, range: SMTSort) {
        this.domain = domain;
        this.range = range;
    }
}

class SMTTupleSort {
    readonly kind = "tuple";
    readonly name: string;
    readonly members: readonly string[];
    readonly components: readonly SMTSort[];

    constructor(name: string, members: string[], components: SMTSort[]) {
        assert(members.length === components.length, `Tuple ${name} has ${members.length} members but ${components.length} components`);

        this.name = name;
        this.members = [...members];
        this.components = [...components];
    }
}

class SMTFunctionSort {
    readonly kind = "function";
    readonly domain: readonly SMTSort[];
    readonly codomain: SMTSort;

    constructor(domain: SMTSort[], codomain: SMTSort) {
        this.domain = [...domain];
        this.codomain = codomain;
    }
}

//Placeholder sort used to pass a sort as an argument (e.g. the array sort of a const_array)
class SMTSortSort {
    readonly kind = "sort";
    readonly inner: SMTSort;

    constructor(inner: SMTSort) {
        this.inner = inner;
    }
}

type SMTSort = SMTIntSort | SMTBoolSort | SMTBitVectorSort | SMTArraySort | SMTTupleSort | SMTFunctionSort | SMTSortSort;

class SMTExpression {
    readonly name: string;
    readonly args: readonly SMTExpression[];
    readonly sort: SMTSort | undefined;

    constructor(name: string, args: SMTExpression[], sort: SMTSort | undefined) {
        this.name = name;
        this.args = [...args];
        this.sort = sort;
    }

    isLeaf(): boolean {
        return this.args.length === 0;
    }

    static makeConst(name: string, sort?: SMTSort): SMTExpression {
        return new SMTExpression(name, [], sort);
    }

    static makeCall(fname: string, args: SMTExpression[], sort?: SMTSort): SMTExpression {
        return new SMTExpression(fname, args, sort);
    }

    static makeEq(lhs: SMTExpression, rhs: SMTExpression): SMTExpression {
        return new SMTExpression("=", [lhs, rhs], new SMTBoolSort());
    }

    static makeNot(exp: SMTExpression): SMTExpression {
        return new SMTExpression("not", [exp], new SMTBoolSort());
    }

    static makeAndOf(...exps: SMTExpression[]): SMTExpression {
        return new SMTExpression("and", exps, new SMTBoolSort());
    }

    static makeOrOf(...exps: SMTExpression[]): SMTExpression {
        return new SMTExpression("or", exps, new SMTBoolSort());
    }

    static makeInt2BV(value: SMTExpression, width: number): SMTExpression {
        const bvsort = new SMTBitVectorSort(width);
        return new SMTExpression("int2bv", [value, SMTExpression.makeConst(`${width}`)], bvsort);
    }

    static makeBV2Int(value: SMTExpression, isSigned: boolean): SMTExpression {
        return new SMTExpression("bv2int", [value], new SMTIntSort(isSigned));
    }

    static makeConstArray(arraysort: SMTArraySort, fill: SMTExpression): SMTExpression {
        const placeholder = SMTExpression.makeConst("", new SMTSortSort(arraysort));
        return new SMTExpression("const_array", [placeholder, fill], arraysort);
    }

    static makeTupleGet(tuple: SMTExpression, index: number): SMTExpression {
        const tsort = tuple.sort;
        const msort = (tsort !== undefined && tsort.kind === "tuple" && index < tsort.components.length) ? tsort.components[index] : undefined;
        return new SMTExpression("tuple_get", [tuple, SMTExpression.makeConst(`${index}`)], msort);
    }

    static makeTupleConstructor(tsort: SMTTupleSort, args: SMTExpression[]): SMTExpression {
        return new SMTExpression("tuple_constructor", args, tsort);
    }
}

export {
    SMTSort,
    SMTIntSort, SMTBoolSort, SMTBitVectorSort, SMTArraySort, SMTTupleSort, SMTFunctionSort, SMTSortSort,
    SMTExpression
};
