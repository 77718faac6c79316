// src/tests/trainingCenterValidation.test.ts
import { ValidationError } from "../middleware/errorHandler";
import { isValidEmail, isValidPhone, parseCreateRequest } from "../lib/trainingCenterValidation";

const body = (overrides: Record<string, unknown> = {}) => ({
  center_name: "Lakeside Trades",
  center_code: "LKS000000042",
  address: { detailed_address: "7 Harbour Lane", city: "Kochi", state: "Kerala", pincode: "682001" },
  contact_phone: "0123456789",
  ...overrides,
});

const failure = (input: unknown): ValidationError => {
  try {
    parseCreateRequest(input);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
};

describe("parseCreateRequest", () => {
  it("returns a typed request with optional fields filled in", () => {
    expect(parseCreateRequest(body())).toEqual({
      ...body(),
      student_capacity: null,
      courses_offered: [],
      contact_email: null,
    });
  });

  it("treats a non-object body as having no fields", () => {
    const err = failure(["center_name"]);
    expect(err.kind).toBe("MissingField");
    expect(err.message).toBe("center_name is required");
  });

  it("checks required fields before anything else", () => {
    const err = failure({ center_name: "N".repeat(60), center_code: "short" });
    expect(err.kind).toBe("MissingField");
    expect(err.message).toBe("address is required");
  });

  it("accepts a 40 character name", () => {
    expect(parseCreateRequest(body({ center_name: "N".repeat(40) })).center_name).toHaveLength(40);
  });

  it("checks the name before the code", () => {
    const err = failure(body({ center_name: "N".repeat(41), center_code: "X" }));
    expect(err.kind).toBe("FieldTooLong");
    expect(err.statusCode).toBe(400);
  });

  it("checks the email before the phone", () => {
    const err = failure(body({ contact_email: "nobody", contact_phone: "1" }));
    expect(err.message).toBe("Invalid email format");
  });

  it("checks the phone before the address", () => {
    const err = failure(body({ contact_phone: "98765-4321", address: {} }));
    expect(err).toMatchObject({ kind: "InvalidFormat", field: "contact_phone" });
  });

  it("treats a null email as absent", () => {
    expect(parseCreateRequest(body({ contact_email: null })).contact_email).toBeNull();
  });

  it("rejects an address that is not an object", () => {
    expect(failure(body({ address: "7 Harbour Lane" })).kind).toBe("IncompleteAddress");
  });

  it("rejects a non-string required field", () => {
    const err = failure(body({ center_code: 123456789012 }));
    expect(err).toMatchObject({ kind: "InvalidType", message: "center_code must be a string" });
  });

  it("rejects a fractional capacity", () => {
    expect(failure(body({ student_capacity: 10.5 })).message).toBe("student_capacity must be an integer");
  });

  it("rejects courses that are not a list of strings", () => {
    expect(failure(body({ courses_offered: "Welding,Plumbing" })).message).toBe(
      "courses_offered must be a list of strings"
    );
    expect(failure(body({ courses_offered: ["Welding", 3] })).kind).toBe("InvalidType");
  });

  it("keeps course order", () => {
    const courses = ["Carpentry", "Audit", "Baking"];
    expect(parseCreateRequest(body({ courses_offered: courses })).courses_offered).toEqual(courses);
  });
});

describe("field patterns", () => {
  it.each([
    ["a@b.co", true],
    ["first.last@mail.example.org", true],
    ["not-an-email", false],
    ["@example.com", false],
    ["name@nodot", false],
  ])("email %s -> %s", (email, expected) => {
    expect(isValidEmail(email)).toBe(expected);
  });

  it.each([
    ["1234567890", true],
    ["12345", false],
    ["12345678901", false],
    ["12345abcde", false],
  ])("phone %s -> %s", (phone, expected) => {
    expect(isValidPhone(phone)).toBe(expected);
  });
});
