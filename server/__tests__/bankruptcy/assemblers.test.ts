import { describe, it, expect } from "vitest";
import { CHECKBOX_UNREADABLE } from "@shared/schema";
import {
  assembleAbTotals,
  assembleLineItem,
  assembleOtherProperty,
  assemblePriorityAmounts,
  assembleRealEstate,
  assembleSecuredCreditor,
  assembleStatistics,
  assembleSummary,
  assembleUnsecuredCreditor,
  assembleVehicle,
  checkboxField,
  removeSequentially,
} from "../../bankruptcy/assemblers";
import type { CheckboxRead } from "../../bankruptcy/checkbox";
import { PartialRecordError } from "../../bankruptcy/errors";

const boxes: CheckboxRead = {
  readable: true,
  boxes: {
    debtor: ["Debtor 1 only"],
    community: [],
    offset: ["No"],
    info: ["Disputed"],
    claim_type: ["Student loans"],
    property: ["Land"],
  },
};

const unreadable: CheckboxRead = { readable: false };

describe("Record assemblers", () => {
  // ==========================================================================
  // Checkbox fields
  // ==========================================================================
  describe("checkboxField", () => {
    it("should copy a category or the unreadable sentinel", () => {
      expect(checkboxField(boxes, "info")).toEqual(["Disputed"]);
      expect(checkboxField(unreadable, "info")).toBe(CHECKBOX_UNREADABLE);
    });
  });

  // ==========================================================================
  // Schedule E/F
  // ==========================================================================
  describe("assembleUnsecuredCreditor", () => {
    const priorityFields = ["2.1\n", "Tax Office", "9911", "$500.00", "$400.00", "$100.00", "01/2020", "1 Main St", "Other", " claim"];

    it("should map a priority entry and its priority split", () => {
      expect(assembleUnsecuredCreditor(priorityFields, boxes, "2.1")).toEqual({
        kind: "unsecured",
        key: "2.1",
        name: "Tax Office",
        acct: "9911",
        total: "$500.00",
        date: "01/2020",
        address: "1 Main St",
        claim_type_other: "Other claim",
        priority_amounts: { priority_amount: "$400.00", non_priority_amount: "$100.00" },
        debtor: ["Debtor 1 only"],
        offset: ["No"],
        info: ["Disputed"],
        claim_type: ["Student loans"],
        community: [],
        other_creditors: [],
      });
    });

    it("should map a nonpriority entry without a priority split", () => {
      const fields = ["4.2", "Card Co", "1234", "$90.00", "2019", "2 Side St", "", ""];
      const creditor = assembleUnsecuredCreditor(fields, unreadable, "4.2");

      expect(creditor).toMatchObject({ key: "4.2", name: "Card Co", date: "2019", address: "2 Side St", claim_type_other: "" });
      expect(creditor.priority_amounts).toBeUndefined();
      expect(creditor.debtor).toBe(CHECKBOX_UNREADABLE);
    });

    it("should reject a short field list", () => {
      expect(() => assembleUnsecuredCreditor(["2.1", "x", "y"], boxes, "2.1")).toThrow(PartialRecordError);
      try {
        assembleUnsecuredCreditor(["2.1", "x", "y"], boxes, "2.1");
      } catch (error) {
        expect(error).toMatchObject({ code: "PARTIAL_RECORD", expected: 10, received: 3 });
      }
    });
  });

  // ==========================================================================
  // Schedule D
  // ==========================================================================
  describe("assemblePriorityAmounts", () => {
    it("should take the two amounts six and five places from the end", () => {
      const fields = ["2.2", "Clinic", "11", "$90", "$60", "$30", "2022", "1 Main", "", ""];
      expect(assemblePriorityAmounts(fields)).toEqual({ priority_amount: "$60", non_priority_amount: "$30" });
    });
  });

  describe("assembleSecuredCreditor", () => {
    it("should map the twelve table fields, skipping the unused positions", () => {
      const fields = ["2.1", "$9,000", "$8,000", "$1,000", "Auto Lender", "-", "2018 Sedan", "5 Bank Rd", "Lien", "2018", "-", "7788"];
      expect(assembleSecuredCreditor(fields, boxes)).toEqual({
        kind: "secured",
        key: "2.1",
        claim: "$9,000",
        collateral: "$8,000",
        unsecured: "$1,000",
        name: "Auto Lender",
        property: "2018 Sedan",
        address: "5 Bank Rd",
        claim_type_other: "Lien",
        date: "2018",
        acct: "7788",
        debtor: ["Debtor 1 only"],
        info: ["Disputed"],
        claim_type: ["Student loans"],
        community: [],
        other_creditors: [],
      });
    });

    it("should reject eleven fields", () => {
      expect(() => assembleSecuredCreditor(Array.from({ length: 11 }, () => ""), boxes)).toThrow(PartialRecordError);
    });
  });

  // ==========================================================================
  // Schedule A/B
  // ==========================================================================
  describe("property sections", () => {
    const realEstate = ["12 Elm St", "Springfield", "IL", "62701", "$150,000", "$150,000", "", "Fee simple", "Sangamon"];

    it("should keep the property id only when the tenth field is present", () => {
      expect(assembleRealEstate("1.1", realEstate, boxes).property_id).toBe("");
      expect(assembleRealEstate("1.1", [...realEstate, "PIN-77"], boxes)).toMatchObject({
        kind: "real_estate",
        key: "1.1",
        city: "Springfield",
        county: "Sangamon",
        property_id: "PIN-77",
        property_interest: ["Land"],
      });
    });

    it("should map vehicles and other conveyances", () => {
      const vehicle = ["Ford", "Focus", "2015", "90000", "-", "Dented", "$4,000", "$4,000"];
      expect(assembleVehicle("3.1", vehicle, boxes)).toMatchObject({
        kind: "vehicle",
        mileage: "90000",
        other_information: "Dented",
        your_property_value: "$4,000",
      });

      const boat = ["Sea", "Skiff", "2001", "-", "Trailer", "$800", "$800"];
      expect(assembleOtherProperty("4.1", boat, unreadable)).toMatchObject({
        kind: "other_property",
        other: "Trailer",
        property_value: "$800",
        debtor: CHECKBOX_UNREADABLE,
      });
    });

    it("should reject short property sections", () => {
      expect(() => assembleRealEstate("1.1", realEstate.slice(0, 8), boxes)).toThrow(PartialRecordError);
      expect(() => assembleVehicle("3.1", [], boxes)).toThrow(PartialRecordError);
      expect(() => assembleOtherProperty("4.1", ["a"], boxes)).toThrow(PartialRecordError);
    });
  });

  describe("assembleLineItem", () => {
    it("should split rows into description and amount runs", () => {
      expect(assembleLineItem("17.", ["Checking account: $1,200.00", "Savings $300.00"])).toEqual({
        key: "17.",
        amounts: ["Checking account: $1,200.00 ", "Savings $300.00"],
      });
    });

    it("should keep rows without amounts as text", () => {
      expect(assembleLineItem("6.", ["Sofa, table", "chairs"])).toEqual({ key: "6.", text: "Sofa, table chairs" });
    });
  });

  describe("assembleAbTotals", () => {
    it("should take ten amounts and drop the ninth", () => {
      const totals = assembleAbTotals(["55. $1 56. $2 57. $3", "58. $4 59. $5 60. $6", "61. $7 62. $8 $9", "63. $10"]);
      expect(totals).toEqual({
        total_real_estate: "1",
        total_vehicles: "2",
        total_household: "3",
        total_financial_assets: "4",
        total_business: "5",
        total_farm: "6",
        total_other: "7",
        total_personal: "8",
        total_all: "10",
      });
    });

    it("should reject fewer than ten amounts", () => {
      expect(() => assembleAbTotals(["$1 $2 $3"])).toThrow(PartialRecordError);
    });
  });

  // ==========================================================================
  // Summary and statistics
  // ==========================================================================
  describe("removeSequentially", () => {
    it("should apply each removal to the list left by the previous one", () => {
      const letters = Array.from("abcdefghijklm");
      expect(removeSequentially(letters, [6, 7, 10, -1, -2]).join("")).toBe("abcdefhk");
    });

    it("should ignore positions past the end", () => {
      expect(removeSequentially(["a"], [3, -5])).toEqual(["a"]);
    });
  });

  describe("assembleSummary", () => {
    const inputs = Array.from({ length: 22 }, (_, i) => `v${i}`);
    const boxLines = ["[√]", "[]", "[√]", "[]", "[√]"];

    it("should map the remaining inputs onto the summary fields", () => {
      const summary = assembleSummary(inputs, boxLines);
      expect(summary["1a"]).toBe("v0");
      expect(summary["3_total"]).toBe("v7");
      expect(summary["4"]).toBe("v9");
      expect(summary["8"]).toBe("v11");
      expect(summary["9a"]).toBe("v13");
      expect(summary["9f"]).toBe("v18");
      expect(summary["9g"]).toBe("v20");
    });

    it("should read the flags from their box lines", () => {
      expect(assembleSummary(inputs, boxLines)).toMatchObject({
        amended: true,
        "7/11/13": true,
        consumer_debts: false,
        non_consumer_debts: true,
      });
    });

    it("should return flags only when no inputs were read", () => {
      expect(assembleSummary([], [])).toEqual({
        "7/11/13": false,
        amended: false,
        consumer_debts: false,
        non_consumer_debts: false,
      });
    });
  });

  describe("assembleStatistics", () => {
    it("should key ten values 6a to 6j", () => {
      const values = Array.from({ length: 10 }, (_, i) => `$${i}`);
      const statistics = assembleStatistics(values);
      expect(statistics["6a"]).toBe("$0");
      expect(statistics["6j"]).toBe("$9");
    });

    it("should reject a partial block", () => {
      expect(() => assembleStatistics(["$1"])).toThrow(PartialRecordError);
    });
  });
});
