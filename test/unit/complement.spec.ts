import { toSigned, toUnsigned } from "../../src/machine/Complement.js";

describe("WHEN converting tens-complement words", () => {
    const expectations: [number, number][] = [
        [0, 0], [1, 1], [499, 499],
        [-1, 999], [-13, 987], [-499, 501], [-500, 500],
    ];

    for (const [signed, word] of expectations) {
        describe(`GIVEN the number ${signed}`, () => {
            test(`THEN it should be stored as ${word}`, () => {
                expect(toUnsigned(signed)).toEqual(word);
            });

            test("THEN it should convert back to the same number", () => {
                expect(toSigned(word)).toEqual(signed);
            });
        });
    }

    describe("GIVEN a smaller base", () => {
        test("THEN the sign boundary should be at half of it", () => {
            expect(toSigned(5, 10)).toEqual(-5);
            expect(toSigned(4, 10)).toEqual(4);
            expect(toUnsigned(-3, 10)).toEqual(7);
        });
    });

    describe("GIVEN all signed numbers in range", () => {
        test("THEN every word should convert back", () => {
            for (let n = -500; n < 500; n++) {
                const word = toUnsigned(n);
                expect(word).toBeGreaterThanOrEqual(0);
                expect(word).toBeLessThan(1000);
                expect(toSigned(word)).toEqual(n);
            }
        });
    });
});
