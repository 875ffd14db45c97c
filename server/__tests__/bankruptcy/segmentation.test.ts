import { describe, it, expect } from "vitest";
import { FlatFieldCollector, SectionScanner } from "../../bankruptcy/segmentation";
import { rule } from "../fixtures/layout";

const partRule = (top: number) => rule(36, 540, top);
const marker = (top: number) => rule(30, 45, top);

describe("Segmentation", () => {
  // ==========================================================================
  // SectionScanner
  // ==========================================================================
  describe("SectionScanner", () => {
    it("should count part rules whose width lies strictly inside the band", () => {
      const scanner = new SectionScanner();
      expect(scanner.observe(rule(0, 498, 10))).toBe(0);
      expect(scanner.observe(partRule(20))).toBe(1);
      expect(scanner.observe(rule(0, 510, 30))).toBe(1);
      expect(scanner.observe(partRule(40))).toBe(2);
      expect(scanner.part).toBe(2);
    });

    it("should bracket an entry with three markers and drop the middle one", () => {
      const scanner = new SectionScanner();
      expect(scanner.collectEntry(marker(100))).toBeNull();
      expect(scanner.collectEntry(marker(150))).toBeNull();
      expect(scanner.collectEntry(marker(200))).toEqual({ top: 100, bottom: 200 });
      expect(scanner.buffered).toHaveLength(0);
    });

    it("should skip a wide header rule while no entry is open", () => {
      const scanner = new SectionScanner();
      expect(scanner.collectEntry(rule(30, 200, 90))).toBeNull();
      expect(scanner.buffered).toHaveLength(0);

      scanner.collectEntry(marker(100));
      scanner.collectEntry(rule(30, 200, 150));
      expect(scanner.collectEntry(marker(200))).toEqual({ top: 100, bottom: 200 });
    });

    it("should clear buffered markers when a new part begins", () => {
      const scanner = new SectionScanner();
      scanner.push(marker(100));
      scanner.push(marker(120));
      scanner.observe(partRule(140));
      expect(scanner.buffered).toHaveLength(0);
    });

    it("should hand over buffered markers on flush", () => {
      const scanner = new SectionScanner();
      expect(scanner.push(marker(100))).toBe(1);
      expect(scanner.push(marker(120))).toBe(2);
      expect(scanner.flush().map((line) => line.top)).toEqual([100, 120]);
      expect(scanner.buffered).toHaveLength(0);
    });
  });

  // ==========================================================================
  // FlatFieldCollector
  // ==========================================================================
  describe("FlatFieldCollector", () => {
    it("should ignore values once the list is complete", () => {
      const collector = new FlatFieldCollector(2);
      expect(collector.add("a")).toBe(true);
      expect(collector.complete).toBe(false);
      expect(collector.add("b")).toBe(true);
      expect(collector.add("c")).toBe(false);
      expect(collector.complete).toBe(true);
      expect(collector.fields).toEqual(["a", "b"]);
    });
  });
});
