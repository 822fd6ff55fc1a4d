import { idsInAll, intersectIds } from "../src/ecs/IdSet";

const table = (...ids: number[]) => {
    const s = new Set(ids);
    return { has: (id: number) => s.has(id) };
};

describe("IdSet helpers", () => {
    describe("intersectIds", () => {
        it("keeps accepted ids in candidate order", () => {
            expect(intersectIds([4, 1, 3], (id) => id !== 1)).toEqual([4, 3]);
            expect(intersectIds([], () => true)).toEqual([]);
        });
    });

    describe("idsInAll", () => {
        it("returns all candidates when there are no tables", () => {
            expect(idsInAll([1, 2, 3], [])).toEqual([1, 2, 3]);
        });

        it("intersects every table", () => {
            expect(idsInAll([1, 2, 3, 4], [table(1, 2, 3), table(2, 3, 9)])).toEqual([2, 3]);
        });

        it("ignores ids that are only in tables", () => {
            expect(idsInAll([1], [table(1, 7)])).toEqual([1]);
        });

        it("returns nothing when any table is missing", () => {
            expect(idsInAll([1, 2], [table(1, 2), undefined])).toEqual([]);
            expect(idsInAll([1, 2], [undefined, table(1, 2)])).toEqual([]);
            expect(idsInAll([1, 2], [table(), undefined])).toEqual([]);
        });

        it("drops duplicate candidates", () => {
            expect(idsInAll([2, 2, 1], [])).toEqual([2, 1]);
        });
    });
});
