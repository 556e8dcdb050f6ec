import { assert, expect } from "chai";
import { describe, it } from "mocha";
import randomSeed from "random-seed";

import { randOperations } from "../../../lib/data/map/generator.ts";
import {
  compareKeyValuePairs,
  createKeyValueTree,
} from "../../../lib/data/map/keyValuePair.ts";
import { TreeMap } from "../../../lib/data/map/treeMap.ts";

function fruitMap(): { map: TreeMap; keys: () => string[] } {
  const tree = createKeyValueTree();
  const map = new TreeMap(tree);
  // insert out of order to exercise tree behavior
  map.insert("mango", "yellow");
  map.insert("apple", "red");
  map.insert("banana", "yellow");
  map.insert("grape", "purple");
  map.insert("cherry", "red");
  return { map, keys: () => tree.toArray().map((pair) => pair.key) };
}

describe("compareKeyValuePairs", () => {
  it("orders by key and ignores the value", () => {
    expect(
      compareKeyValuePairs({ key: "a", value: "z" }, { key: "b", value: "a" }),
    ).to.equal(-1);
    expect(
      compareKeyValuePairs({ key: "b", value: "" }, { key: "a", value: "" }),
    ).to.equal(1);
    expect(
      compareKeyValuePairs({ key: "k", value: "1" }, { key: "k", value: "2" }),
    ).to.equal(0);
  });
});

describe("TreeMap", () => {
  describe("basic insert and get", () => {
    const map = new TreeMap();
    map.insert("keyOne", "valueOne");
    map.insert("keyTwo", "valueTwo");
    map.insert("keyThree", "valueThree");

    it("returns correct values for existing keys", () => {
      expect(map.get("keyOne")).to.equal("valueOne");
      expect(map.get("keyTwo")).to.equal("valueTwo");
      expect(map.get("keyThree")).to.equal("valueThree");
    });

    it("returns undefined for missing keys", () => {
      assert.isUndefined(map.get("keyDoesNotExist"));
      assert.isUndefined(map.get("anotherMissing"));
    });

    it("falls back to an empty string with getOrDefault", () => {
      expect(map.getOrDefault("keyDoesNotExist")).to.equal("");
      expect(map.getOrDefault("keyDoesNotExist", "none")).to.equal("none");
      expect(map.getOrDefault("keyOne", "none")).to.equal("valueOne");
    });
  });

  describe("updates and deletes", () => {
    it("overwrites the value of an existing key", () => {
      const map = new TreeMap();
      map.insert("user", "Brad");
      expect(map.get("user")).to.equal("Brad");

      map.insert("user", "Bellinder");
      expect(map.get("user")).to.equal("Bellinder");
      expect(map.size).to.equal(1);
    });

    it("removes a deleted key", () => {
      const map = new TreeMap();
      map.insert("user", "Brad");
      map.deleteKey("user");

      assert.isUndefined(map.get("user"));
      expect(map.has("user")).to.equal(false);
      expect(map.size).to.equal(0);
    });

    it("ignores deletes of missing keys", () => {
      const map = new TreeMap();
      map.insert("user", "Brad");
      map.deleteKey("doesNotExist");

      expect(map.get("user")).to.equal("Brad");
      expect(map.size).to.equal(1);
    });

    it("splays the last key on the search path when deleting a missing key", () => {
      const map = new TreeMap();
      // ascending inserts leave the path c -> b -> a
      map.insert("a", "1");
      map.insert("b", "2");
      map.insert("c", "3");
      map.deleteKey("bb");

      expect(map.rootKey()).to.equal("b");
      expect(map.size).to.equal(3);
      expect(map.get("a")).to.equal("1");
    });

    it("tells an empty value apart from a missing key", () => {
      const map = new TreeMap();
      map.insert("blank", "");

      expect(map.get("blank")).to.equal("");
      expect(map.has("blank")).to.equal(true);
      assert.isUndefined(map.get("missing"));
      expect(map.has("missing")).to.equal(false);
    });
  });

  describe("multiple keys", () => {
    it("keeps keys in ascending order", () => {
      const { keys } = fruitMap();
      expect(keys()).to.deep.equal([
        "apple",
        "banana",
        "cherry",
        "grape",
        "mango",
      ]);
    });

    it("retrieves every inserted key", () => {
      const { map } = fruitMap();
      expect(map.get("apple")).to.equal("red");
      expect(map.get("banana")).to.equal("yellow");
      expect(map.get("cherry")).to.equal("red");
      expect(map.get("grape")).to.equal("purple");
      expect(map.get("mango")).to.equal("yellow");
    });

    it("leaves the other keys intact after deletes", () => {
      const { map, keys } = fruitMap();
      map.deleteKey("banana");
      map.deleteKey("apple");

      assert.isUndefined(map.get("banana"));
      assert.isUndefined(map.get("apple"));
      expect(map.get("cherry")).to.equal("red");
      expect(map.get("grape")).to.equal("purple");
      expect(map.get("mango")).to.equal("yellow");
      expect(keys()).to.deep.equal(["cherry", "grape", "mango"]);
    });

    it("splays every found key to the root", () => {
      const { map } = fruitMap();
      for (const key of ["grape", "apple", "mango", "cherry", "banana"]) {
        map.get(key);
        expect(map.rootKey()).to.equal(key);
      }
    });

    it("splays an inserted key to the root", () => {
      const { map } = fruitMap();
      map.insert("fig", "green");
      expect(map.rootKey()).to.equal("fig");
      map.insert("apple", "green");
      expect(map.rootKey()).to.equal("apple");
    });

    it("can be cleared and reused", () => {
      const { map, keys } = fruitMap();
      map.clear();
      expect(map.size).to.equal(0);
      assert.isUndefined(map.rootKey());

      map.insert("kiwi", "brown");
      expect(keys()).to.deep.equal(["kiwi"]);
    });
  });

  describe("random operation sequences", () => {
    it("agree with a reference Map and keep the tree valid", () => {
      const rs = randomSeed.create("treemap-reference-test");
      const tree = createKeyValueTree();
      const map = new TreeMap(tree);
      const reference = new Map<string, string>();

      for (const op of randOperations(rs, 3000, 64)) {
        switch (op.kind) {
          case "insert":
            map.insert(op.key, op.value);
            reference.set(op.key, op.value);
            break;
          case "get":
            expect(map.get(op.key)).to.equal(reference.get(op.key));
            break;
          case "delete":
            map.deleteKey(op.key);
            reference.delete(op.key);
            break;
        }
        expect(map.size).to.equal(reference.size);
        tree.assertInvariants();
      }

      const expected = [...reference.entries()].sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0
      );
      expect(tree.toArray().map(({ key, value }) => [key, value])).to.deep
        .equal(expected);
    });
  });
});
