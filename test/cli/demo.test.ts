import { expect } from "chai";
import { describe, it } from "mocha";

import { runDemo } from "../../lib/cli/demo.ts";
import { TreeMap } from "../../lib/data/map/treeMap.ts";
import { VERSION } from "../../lib/shared/version.ts";

describe("runDemo", () => {
  it("prints the two stored values and an empty missing one", () => {
    expect(runDemo()).to.deep.equal(["valueOne", "valueThree", "[]"]);
  });

  it("deletes keyOne at the end", () => {
    const map = new TreeMap();
    runDemo(map);
    expect(map.has("keyOne")).to.equal(false);
    expect(map.get("keyTwo")).to.equal("valueTwo");
    expect(map.size).to.equal(2);
  });
});

describe("VERSION", () => {
  it("is read from package.json", () => {
    expect(VERSION).to.equal("1.0.0");
  });
});
