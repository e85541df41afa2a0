import { describe, it } from "mocha";
import { expect } from "chai";
import { hasReservedPathChars, isSymbolicName } from "./path-token.js";

describe("hasReservedPathChars", () => {
  it("should detect every reserved character", () => {
    for (const ch of [":", "*", "?", "<", ">", "|", '"']) {
      expect(hasReservedPathChars(`Acme${ch}Widget`), ch).to.be.true;
    }
  });

  it("should treat dotted namespaces as symbolic", () => {
    expect(hasReservedPathChars("System.Collections.Generic")).to.be.false;
  });

  it("should treat relative paths without reserved characters as symbolic", () => {
    expect(hasReservedPathChars("lib/Acme.Widget.dll")).to.be.false;
  });

  it("should flag drive-letter paths", () => {
    expect(hasReservedPathChars("C:\\libs\\Acme.Widget.dll")).to.be.true;
  });

  it("should treat the empty string as symbolic", () => {
    expect(hasReservedPathChars("")).to.be.false;
    expect(isSymbolicName("")).to.be.true;
  });
});

describe("isSymbolicName", () => {
  it("should be the negation of hasReservedPathChars", () => {
    expect(isSymbolicName("Acme.Widget")).to.be.true;
    expect(isSymbolicName("Acme*")).to.be.false;
  });
});
