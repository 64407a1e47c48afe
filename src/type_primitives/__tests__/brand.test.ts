import { describe, expect, it } from "vitest";
import type { Brand } from "../brand";
import { is_non_negative_integer, validate_and_cast } from "../assertions";

type TicketID = Brand<number, "ticket_id">;

const as_ticket_id = (value: number) =>
  validate_and_cast<number, TicketID>(
    value,
    is_non_negative_integer,
    "TicketID must be a non-negative integer",
  );

describe("Brand", () => {
  it("a minted brand is the plain number at runtime", () => {
    const id = as_ticket_id(9);
    expect(id).toBe(9);
    expect(typeof id).toBe("number");
  });

  it("branded numbers still index arrays and do arithmetic", () => {
    const id = as_ticket_id(2);
    const names = ["a", "b", "c"];
    expect(names[id]).toBe("c");
    expect(id + 1).toBe(3);
  });

  it("minting rejects values the validator refuses", () => {
    expect(() => as_ticket_id(-1)).toThrow(
      "TicketID must be a non-negative integer",
    );
  });
});
