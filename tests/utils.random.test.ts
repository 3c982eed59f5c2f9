import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { deriveSeed, pick, SeededRandom } from "../src/utils/random.js";

describe("utils seeded random", () => {
  it("follows the Park–Miller recurrence", () => {
    const random = new SeededRandom(1);
    expect(random.next()).to.equal(48_270 / 2_147_483_646);
    expect(random.next()).to.equal((((48_271 * 48_271) % 2_147_483_647) - 1) / 2_147_483_646);
  });

  it("replays the same sequence for the same seed", () => {
    fc.assert(
      fc.property(fc.oneof(fc.integer(), fc.string()), (seed) => {
        const first = new SeededRandom(seed);
        const second = new SeededRandom(seed);
        for (let index = 0; index < 20; index += 1) {
          const value = first.next();
          expect(value).to.equal(second.next());
          expect(value).to.be.at.least(0);
          expect(value).to.be.below(1);
        }
      }),
    );
  });

  it("hashes textual seeds into a non-zero state", () => {
    expect(deriveSeed("")).to.equal(1);
    expect(deriveSeed("a")).to.equal(97);
    expect(deriveSeed("ab")).to.equal(97 * 31 + 98);
  });

  it("picks entries by scaling the next draw", () => {
    const items = ["first", "second", "third"] as const;
    expect(pick({ next: () => 0 }, items)).to.equal("first");
    expect(pick({ next: () => 0.5 }, items)).to.equal("second");
    expect(pick({ next: () => 0.999 }, items)).to.equal("third");
  });
});
