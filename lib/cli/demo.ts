import { TreeMap } from "../data/map/treeMap.ts";

/**
 * Insert three keys, read two of them back plus a missing one, then delete
 * the first. Returns the lines to print; a missing key prints as `[]`.
 */
export function runDemo(map: TreeMap = new TreeMap()): string[] {
  map.insert("keyOne", "valueOne");
  map.insert("keyTwo", "valueTwo");
  map.insert("keyThree", "valueThree");

  const lines = [
    map.getOrDefault("keyOne"),
    map.getOrDefault("keyThree"),
    `[${map.getOrDefault("keyDoesNotExist")}]`,
  ];

  map.deleteKey("keyOne");
  return lines;
}
