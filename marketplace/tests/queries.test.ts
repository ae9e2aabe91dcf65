import { beforeEach, describe, expect, it } from "vitest";
import { MemoryInventory } from "../src/adapters/inventory.memory";
import { ListingCache } from "../src/core/listing-cache";
import { PendingSet } from "../src/core/pending-set";
import { ListingClassifier } from "../src/core/queries";

describe("ListingClassifier", () => {
  let cache: ListingCache;
  let pending: PendingSet;
  let inventory: MemoryInventory;
  let classifier: ListingClassifier;

  beforeEach(() => {
    cache = new ListingCache();
    pending = new PendingSet();
    inventory = MemoryInventory.fromEntries([
      { id: "root", parentId: null },
      { id: "F1", parentId: "root" },
      { id: "V1", parentId: "F1" },
      { id: "V1-sub", parentId: "V1" },
      { id: "item", parentId: "V1-sub" },
      { id: "F2", parentId: "root" },
      { id: "V2", parentId: "F2" },
      { id: "stray", parentId: "root" },
    ]);
    classifier = new ListingClassifier(cache, pending, inventory);

    cache.upsert("F1", 1, "V1", true);
    cache.upsert("F2", 2, "V2", false);
  });

  it("should answer listing questions from the cache", () => {
    expect(classifier.isListed("F1")).toBe(true);
    expect(classifier.isListed("V1")).toBe(false);
    expect(classifier.isListedAndActive("F1")).toBe(true);
    expect(classifier.isListedAndActive("F2")).toBe(false);
    expect(classifier.isVersionFolder("V2")).toBe(true);
    expect(classifier.isVersionFolder("F2")).toBe(false);
  });

  describe("getActiveFolder", () => {
    it("should find the active version folder above an item", () => {
      expect(classifier.getActiveFolder("item")).toBe("V1");
      expect(classifier.isInActiveFolder("item")).toBe(true);
    });

    it("should count the item itself", () => {
      expect(classifier.getActiveFolder("V1")).toBe("V1");
    });

    it("should ignore version folders of inactive listings", () => {
      expect(classifier.getActiveFolder("V2")).toBeNull();
      expect(classifier.isInActiveFolder("stray")).toBe(false);
    });

    it("should follow the inventory when content moves", () => {
      inventory.moveFolder("V1-sub", "stray");
      expect(classifier.getActiveFolder("item")).toBeNull();
    });
  });

  describe("isUpdating", () => {
    it("should report pending folders and the bulk refresh", () => {
      expect(classifier.isUpdating("F1")).toBe(false);

      pending.begin("F1");
      expect(classifier.isUpdating("F1")).toBe(true);
      expect(classifier.isUpdating("F2")).toBe(false);

      pending.setUpdating(true);
      expect(classifier.isUpdating("F2")).toBe(true);
    });

    it("should not change other answers while work is pending", () => {
      pending.begin("F2");
      pending.setUpdating(true);

      expect(classifier.isListedAndActive("F1")).toBe(true);
      expect(classifier.getActiveFolder("item")).toBe("V1");
    });
  });
});
