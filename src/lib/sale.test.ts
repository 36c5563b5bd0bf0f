import { describe, it, expect } from "vitest";
import {
  deserializeSale,
  parseSaleForm,
  saleTotal,
  serializeSale,
  toStoredRangeBound,
  validateSaleInput,
} from "./sale";
import { MalformedRecordError, SaleValidationError } from "./errors";
import type { Sale } from "./types";

describe("Sale record model", () => {
  const createMockSale = (overrides: Partial<Sale> = {}): Sale => ({
    client: "Wanjiku Stores",
    quantity: 12,
    paid: 1500.5,
    unpaid: 249.5,
    transactionType: "Mpesa",
    location: "Kisumu",
    date: new Date("2024-03-05T09:15:30.250Z"),
    ...overrides,
  });

  describe("saleTotal", () => {
    it("adds paid and unpaid", () => {
      expect(saleTotal(createMockSale())).toBe(1750);
      expect(saleTotal({ paid: 0, unpaid: 0 })).toBe(0);
    });
  });

  describe("serializeSale", () => {
    it("flattens fields and stores the date as an ISO string", () => {
      expect(serializeSale(createMockSale({ id: 7 }))).toEqual({
        id: 7,
        client: "Wanjiku Stores",
        quantity: 12,
        paid: 1500.5,
        unpaid: 249.5,
        transaction_type: "Mpesa",
        location: "Kisumu",
        date: "2024-03-05T09:15:30.250Z",
      });
    });

    it("leaves out the id of an unsaved sale and never stores the total", () => {
      const row = serializeSale(createMockSale());
      expect("id" in row).toBe(false);
      expect("total" in row).toBe(false);
    });

    it("produces date strings whose text order is their time order", () => {
      const earlier = serializeSale(createMockSale({ date: new Date("2024-01-09T23:00:00.000Z") }));
      const later = serializeSale(createMockSale({ date: new Date("2024-01-10T01:00:00.000Z") }));
      expect(earlier.date < later.date).toBe(true);
    });

    it("refuses to store dates past the four-digit years", () => {
      for (const date of [new Date("+010000-01-01T00:00:00.000Z"), new Date("-000001-12-31T00:00:00.000Z")]) {
        try {
          validateSaleInput(createMockSale({ date }));
          expect.unreachable("validateSaleInput should have thrown");
        } catch (error) {
          expect(error).toBeInstanceOf(SaleValidationError);
          expect((error as SaleValidationError).errors).toEqual({
            date: ["must fall between the years 0000 and 9999"],
          });
        }
      }
      expect(validateSaleInput(createMockSale({ date: new Date("9999-12-31T23:59:59.999Z") })).date).toEqual(
        new Date("9999-12-31T23:59:59.999Z"),
      );
    });

    it("pulls range bounds back into the four-digit years", () => {
      expect(toStoredRangeBound(new Date("+020000-01-01T00:00:00.000Z"))).toBe("9999-12-31T23:59:59.999Z");
      expect(toStoredRangeBound(new Date("-000500-06-01T00:00:00.000Z"))).toBe("0000-01-01T00:00:00.000Z");
      expect(toStoredRangeBound(new Date("2024-01-10T01:00:00.000Z"))).toBe("2024-01-10T01:00:00.000Z");
    });
  });

  describe("deserializeSale", () => {
    it("reproduces every field of a serialized sale", () => {
      const sale = createMockSale({ id: 3, transactionType: "Cheque" });
      const restored = deserializeSale(serializeSale(sale));
      expect(restored).toEqual(sale);
      expect(restored.date.getTime()).toBe(sale.date.getTime());
      expect(saleTotal(restored)).toBe(sale.paid + sale.unpaid);
    });

    it("rejects an unparsable timestamp and names the row", () => {
      const row = { ...serializeSale(createMockSale({ id: 42 })), date: "not-a-date" };
      try {
        deserializeSale(row);
        expect.unreachable("deserializeSale should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedRecordError);
        const malformed = error as MalformedRecordError;
        expect(malformed.rowId).toBe(42);
        expect(malformed.issues).toEqual(['date: unparsable timestamp "not-a-date"']);
      }
    });

    it("rejects an unknown transaction type", () => {
      const row = { ...serializeSale(createMockSale({ id: 5 })), transaction_type: "Barter" };
      expect(() => deserializeSale(row)).toThrow(MalformedRecordError);
    });

    it("reports a missing id as null", () => {
      expect(() => deserializeSale({ client: "x" })).toThrow(/^Malformed sale record: /);
    });
  });

  describe("validateSaleInput", () => {
    it("returns the sale with trimmed text", () => {
      const valid = validateSaleInput(createMockSale({ client: "  Otieno  ", location: " Nakuru " }));
      expect(valid.client).toBe("Otieno");
      expect(valid.location).toBe("Nakuru");
    });

    it("collects every invalid field", () => {
      try {
        validateSaleInput(createMockSale({ client: "   ", quantity: -1, paid: -5, location: "" }));
        expect.unreachable("validateSaleInput should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(SaleValidationError);
        expect((error as SaleValidationError).errors).toEqual({
          client: ["is required"],
          quantity: ["cannot be negative"],
          paid: ["cannot be negative"],
          location: ["is required"],
        });
      }
    });

    it("rejects fractional quantities and invalid dates", () => {
      expect(() => validateSaleInput(createMockSale({ quantity: 1.5 }))).toThrow(SaleValidationError);
      expect(() => validateSaleInput(createMockSale({ date: new Date("garbage") }))).toThrow(
        SaleValidationError,
      );
    });
  });

  describe("parseSaleForm", () => {
    const now = new Date(2024, 5, 1, 12, 0);

    it("trims text and parses numbers", () => {
      const sale = parseSaleForm(
        {
          client: " Mama Njeri ",
          quantity: " 4 ",
          paid: "350.75",
          unpaid: "49.25",
          transactionType: "Cash",
          location: " Eldoret ",
        },
        now,
      );
      expect(sale).toEqual({
        client: "Mama Njeri",
        quantity: 4,
        paid: 350.75,
        unpaid: 49.25,
        transactionType: "Cash",
        location: "Eldoret",
        date: now,
      });
    });

    it("turns unparsable or negative amounts into zero and defaults the type", () => {
      const sale = parseSaleForm(
        { client: "A", quantity: "2.5", paid: "abc", unpaid: "-10", transactionType: "Card", location: "B" },
        now,
      );
      expect(sale.quantity).toBe(0);
      expect(sale.paid).toBe(0);
      expect(sale.unpaid).toBe(0);
      expect(sale.transactionType).toBe("Mpesa");
    });

    it("keeps a date picked on the form", () => {
      const picked = new Date(2024, 0, 15);
      const sale = parseSaleForm(
        { client: "A", quantity: "1", paid: "", unpaid: "", location: "B", date: picked },
        now,
      );
      expect(sale.date).toEqual(picked);
      expect(sale.paid).toBe(0);
    });
  });
});
