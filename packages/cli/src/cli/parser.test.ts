/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse resolve command with name", () => {
        const result = parseArgs(["resolve", "Acme.Widget"]);
        expect(result.command).to.equal("resolve");
        expect(result.name).to.equal("Acme.Widget");
      });

      it("should parse probe command with name and directory", () => {
        const result = parseArgs(["probe", "Acme.Widget", "lib"]);
        expect(result.command).to.equal("probe");
        expect(result.name).to.equal("Acme.Widget");
        expect(result.secondArg).to.equal("lib");
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after a command", () => {
        const result = parseArgs(["resolve", "-h"]);
        expect(result.command).to.equal("help");
      });

      it("should parse version command from --version", () => {
        const result = parseArgs(["--version"]);
        expect(result.command).to.equal("version");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should return an empty command when none is given", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
        expect(result.name).to.be.undefined;
      });
    });

    describe("Options", () => {
      it("should parse --verbose and -V", () => {
        expect(parseArgs(["resolve", "--verbose"]).options.verbose).to.be.true;
        expect(parseArgs(["resolve", "-V"]).options.verbose).to.be.true;
      });

      it("should parse --quiet and -q", () => {
        expect(parseArgs(["resolve", "--quiet"]).options.quiet).to.be.true;
        expect(parseArgs(["resolve", "-q"]).options.quiet).to.be.true;
      });

      it("should parse --config with value", () => {
        const result = parseArgs(["resolve", "-c", "custom.yaml"]);
        expect(result.options.config).to.equal("custom.yaml");
      });

      it("should parse --ignore with value", () => {
        const result = parseArgs(["resolve", "Widget", "--ignore", "host.dll"]);
        expect(result.options.ignore).to.equal("host.dll");
        expect(result.name).to.equal("Widget");
      });

      it("should parse -i short option for ignore", () => {
        const result = parseArgs(["resolve", "Widget", "-i", "host.dll"]);
        expect(result.options.ignore).to.equal("host.dll");
      });

      it("should parse --shared-dir with value", () => {
        const result = parseArgs(["shared", "Widget", "--shared-dir", "/opt/rt"]);
        expect(result.options.sharedDir).to.equal("/opt/rt");
      });

      it("should parse --json", () => {
        expect(parseArgs(["resolve", "Widget", "--json"]).options.json).to.be
          .true;
      });

      it("should collect repeated search directories in order", () => {
        const result = parseArgs([
          "resolve",
          "Widget",
          "-L",
          "lib",
          "--lib",
          "bin",
          "-L",
          "plugins",
        ]);
        expect(result.options.lib).to.deep.equal(["lib", "bin", "plugins"]);
      });

      it("should ignore an empty search directory", () => {
        const result = parseArgs(["resolve", "Widget", "-L", ""]);
        expect(result.options.lib).to.be.undefined;
      });

      it("should treat a missing option value as empty", () => {
        const result = parseArgs(["resolve", "Widget", "--config"]);
        expect(result.options.config).to.equal("");
      });

      it("should leave ignore unset when its value is missing or empty", () => {
        expect(parseArgs(["resolve", "Widget", "--ignore"]).options.ignore).to
          .be.undefined;
        expect(parseArgs(["resolve", "Widget", "-i", ""]).options.ignore).to.be
          .undefined;
      });
    });

    describe("Positional separator", () => {
      it("should accept names starting with a dash after --", () => {
        const result = parseArgs(["resolve", "--", "-odd-name"]);
        expect(result.command).to.equal("resolve");
        expect(result.name).to.equal("-odd-name");
      });
    });
  });
});
