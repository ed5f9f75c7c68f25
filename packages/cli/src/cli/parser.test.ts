/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";
import type { CliFailure, RawArguments } from "../types.js";
import type { FileReader } from "./response-files.js";

const noFiles: FileReader = (path) => {
  throw new Error(`ENOENT: no such file or directory, open '${path}'`);
};

const parseCompile = (
  args: string[],
  readFile: FileReader = noFiles
): RawArguments => {
  const result = parseArgs(args, readFile);
  if (!result.ok) {
    throw new Error(`unexpected failure: ${JSON.stringify(result.error)}`);
  }
  if (result.value.command !== "compile") {
    throw new Error(`unexpected command: ${result.value.command}`);
  }
  return result.value.args;
};

const parseFailure = (args: string[]): CliFailure => {
  const result = parseArgs(args, noFiles);
  if (result.ok) {
    throw new Error("expected a failure");
  }
  return result.error;
};

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.ok && result.value.command).to.equal("help");
      });

      it("should parse help command from -h", () => {
        const result = parseArgs(["mod.py", "-h"]);
        expect(result.ok && result.value.command).to.equal("help");
      });

      it("should parse version command from --version", () => {
        const result = parseArgs(["--version"]);
        expect(result.ok && result.value.command).to.equal("version");
      });

      it("should parse a compile command from an input file", () => {
        const args = parseCompile(["mod.py"]);
        expect(args.inputPath).to.equal("mod.py");
      });
    });

    describe("Defaults", () => {
      it("should leave every switch off", () => {
        const args = parseCompile(["mod.py"]);
        expect(args.outputPath).to.be.undefined;
        expect(args.translateOnly).to.be.false;
        expect(args.rawTranslateOnly).to.be.false;
        expect(args.verbose).to.be.false;
        expect(args.debugFlag).to.be.false;
        expect(args.opts).to.deep.equal([]);
        expect(args.extraIflags).to.deep.equal([]);
        expect(args.extraLflags).to.deep.equal([]);
      });

      it("should default the optimization level to 2", () => {
        expect(parseCompile(["mod.py"]).extraOflags).to.deep.equal(["2"]);
      });

      it("should replace the default when -O is given", () => {
        expect(parseCompile(["-O3", "mod.py"]).extraOflags).to.deep.equal([
          "3",
        ]);
      });
    });

    describe("Options", () => {
      it("should parse -o with a separate value", () => {
        expect(parseCompile(["mod.py", "-o", "out.so"]).outputPath).to.equal(
          "out.so"
        );
      });

      it("should parse -o with an attached value", () => {
        expect(parseCompile(["-oout.so", "mod.py"]).outputPath).to.equal(
          "out.so"
        );
      });

      it("should keep the last -o", () => {
        const args = parseCompile(["-o", "a.so", "mod.py", "-o", "b.so"]);
        expect(args.outputPath).to.equal("b.so");
      });

      it("should parse -E", () => {
        const args = parseCompile(["-E", "mod.py"]);
        expect(args.translateOnly).to.be.true;
        expect(args.rawTranslateOnly).to.be.false;
      });

      it("should make -e imply -E", () => {
        const args = parseCompile(["-e", "mod.py"]);
        expect(args.rawTranslateOnly).to.be.true;
        expect(args.translateOnly).to.be.true;
      });

      it("should parse -v and -g", () => {
        const args = parseCompile(["-v", "-g", "mod.py"]);
        expect(args.verbose).to.be.true;
        expect(args.debugFlag).to.be.true;
      });

      it("should accumulate multi-valued flags in order", () => {
        const args = parseCompile([
          "-I/a",
          "mod.py",
          "-I",
          "/b",
          "-Dx",
          "-DNDEBUG",
          "-pinline",
          "-p",
          "loop_unroll",
          "-mavx2",
          "-ffast-math",
          "-L/usr/lib",
        ]);
        expect(args.extraIflags).to.deep.equal(["/a", "/b"]);
        expect(args.extraDflags).to.deep.equal(["x", "NDEBUG"]);
        expect(args.opts).to.deep.equal(["inline", "loop_unroll"]);
        expect(args.extraMflags).to.deep.equal(["avx2"]);
        expect(args.extraFflags).to.deep.equal(["fast-math"]);
        expect(args.extraLflags).to.deep.equal(["/usr/lib"]);
      });

      it("should parse clustered boolean flags", () => {
        const args = parseCompile(["-Evg", "mod.py"]);
        expect(args.translateOnly).to.be.true;
        expect(args.verbose).to.be.true;
        expect(args.debugFlag).to.be.true;
      });

      it("should give the rest of a cluster to a valued flag", () => {
        const args = parseCompile(["-vI/inc", "mod.py"]);
        expect(args.verbose).to.be.true;
        expect(args.extraIflags).to.deep.equal(["/inc"]);
      });

      it("should treat everything after -- as positional", () => {
        const args = parseCompile(["-v", "--", "-weird.py"]);
        expect(args.inputPath).to.equal("-weird.py");
      });

      it("should record the expanded token list", () => {
        const args = parseCompile(["-O3", "mod.py"]);
        expect(args.tokens).to.deep.equal(["-O3", "mod.py"]);
      });
    });

    describe("Response files", () => {
      it("should splice response-file flags into the -I list", () => {
        const files: Record<string, string> = {
          "flags.txt": "-I/inc1\n-I/inc2\n",
        };
        const args = parseCompile(["@flags.txt", "mod.py"], (path) => {
          const content = files[path];
          if (content === undefined) throw new Error(`missing ${path}`);
          return content;
        });
        expect(args.extraIflags).to.deep.equal(["/inc1", "/inc2"]);
      });

      it("should keep order across direct and expanded arguments", () => {
        const args = parseCompile(["-I/first", "@more.txt", "-I/last", "mod.py"], () =>
          "  -I/middle\t\n\n"
        );
        expect(args.extraIflags).to.deep.equal(["/first", "/middle", "/last"]);
      });

      it("should let a flag take its value from a response file", () => {
        const args = parseCompile(["mod.py", "-o", "@out.txt"], () => "mod.so");
        expect(args.outputPath).to.equal("mod.so");
      });
    });

    describe("Errors", () => {
      it("should require an input file", () => {
        expect(parseFailure(["-v"])).to.deep.equal({
          kind: "ArgumentError",
          message: "the following arguments are required: input_file",
        });
      });

      it("should reject a second positional", () => {
        expect(parseFailure(["a.py", "b.py"])).to.deep.equal({
          kind: "ArgumentError",
          message: "unrecognized arguments: b.py",
        });
      });

      it("should reject unknown short options", () => {
        expect(parseFailure(["-x", "mod.py"])).to.deep.equal({
          kind: "ArgumentError",
          message: "unrecognized option '-x'",
        });
      });

      it("should reject unknown long options", () => {
        expect(parseFailure(["--fast", "mod.py"])).to.deep.equal({
          kind: "ArgumentError",
          message: "unrecognized option '--fast'",
        });
      });

      it("should reject a valued flag at the end", () => {
        expect(parseFailure(["mod.py", "-I"])).to.deep.equal({
          kind: "ArgumentError",
          message: "option -I expects a value",
        });
      });

      it("should reject a valued flag followed by another option", () => {
        expect(parseFailure(["-o", "-v", "mod.py"])).to.deep.equal({
          kind: "ArgumentError",
          message: "option -o expects a value",
        });
      });

      it("should report an unreadable response file", () => {
        expect(parseFailure(["@nope.txt", "mod.py"])).to.deep.equal({
          kind: "ArgumentError",
          message:
            "cannot read response file 'nope.txt': ENOENT: no such file or directory, open 'nope.txt'",
        });
      });
    });
  });
});
