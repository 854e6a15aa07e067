import chai from "chai";
import type { InvalidUtf8Error } from "../lib/errors/invalid-utf8.js";
import type { LineTerminatorError } from "../lib/errors/line-terminator.js";
import type { ResponseHeaderError } from "../lib/errors/response-header.js";
import { DefaultParseContext, META_MAX_LENGTH } from "../lib/parse-context.js";
import { parseResponse, Response, type ResponseFrame } from "../lib/response.js";
import { StatusCategory } from "../lib/status-category.js";
import { assertComplete, assertFailure, assertPartial, readBufferString } from "./_utils.js";

describe("Response.parse", function () {
  it("parses a response header", function () {
    const res: Response = new Response();
    assertComplete(res.parse(readBufferString("20 metadata\r\n")));
    chai.assert.strictEqual(res.status, 20);
    chai.assert.strictEqual(res.meta, "metadata");
    chai.assert.strictEqual(res.category, StatusCategory.Success);
  });

  it("is partial without a terminator", function () {
    const res: Response = new Response();
    assertPartial(res.parse(readBufferString("20 metadata")));
    chai.assert.isUndefined(res.status);
    chai.assert.isUndefined(res.meta);
  });

  it("fails on a CR followed by another byte", function () {
    const res: Response = new Response();
    const error: LineTerminatorError = assertFailure(res.parse(readBufferString("20 metadata\ra")), "LineTerminator");
    chai.assert.deepEqual(error.data, {pos: 12});
    chai.assert.isUndefined(res.status);
  });

  it("accepts a bare LF terminator", function () {
    const res: Response = new Response();
    assertComplete(res.parse(readBufferString("51 Not found\n")));
    chai.assert.strictEqual(res.status, 51);
    chai.assert.strictEqual(res.meta, "Not found");
    chai.assert.strictEqual(res.category, StatusCategory.PermanentFailure);
  });

  it("accepts empty metadata", function () {
    const res: Response = new Response();
    assertComplete(res.parse(readBufferString("30 \r\n")));
    chai.assert.strictEqual(res.status, 30);
    chai.assert.strictEqual(res.meta, "");
  });

  it("decodes UTF-8 metadata", function () {
    const res: Response = new Response();
    assertComplete(res.parse(Buffer.from("20 text/gemini; lang=fr; titre=café\r\n", "utf8")));
    chai.assert.strictEqual(res.meta, "text/gemini; lang=fr; titre=café");
  });

  it("is partial while the status code or separator is missing", function () {
    assertPartial(new Response().parse(readBufferString("")));
    assertPartial(new Response().parse(readBufferString("2")));
    assertPartial(new Response().parse(readBufferString("20")));
  });

  it("rejects a status code with a non-digit", function () {
    assertFailure(new Response().parse(readBufferString("2x meta\r\n")), "InvalidStatus");
  });

  it("rejects a missing separator", function () {
    const res: Response = new Response();
    const error: ResponseHeaderError = assertFailure(res.parse(readBufferString("20metadata\r\n")), "ResponseHeader");
    chai.assert.deepEqual(error.data, {pos: 2, byte: 0x6d});
    chai.assert.isUndefined(res.status);
  });

  it("rejects metadata that is not UTF-8", function () {
    const res: Response = new Response();
    const error: InvalidUtf8Error = assertFailure(res.parse(readBufferString("20 \xc3\x28\r\n")), "InvalidUtf8");
    chai.assert.deepEqual(error.data, {start: 3, end: 5});
    chai.assert.isUndefined(res.status);
    chai.assert.isUndefined(res.meta);
  });

  it("accepts metadata of exactly the maximum length", function () {
    const meta: string = "a".repeat(META_MAX_LENGTH);
    const res: Response = new Response();
    assertComplete(res.parse(readBufferString(`20 ${meta}\r\n`)));
    chai.assert.strictEqual(res.meta, meta);
  });

  it("rejects metadata one byte over the maximum length", function () {
    const meta: string = "a".repeat(META_MAX_LENGTH + 1);
    const error: LineTerminatorError = assertFailure(
      new Response().parse(readBufferString(`20 ${meta}\r\n`)),
      "LineTerminator",
    );
    chai.assert.deepEqual(error.data, {pos: 3 + META_MAX_LENGTH, limit: META_MAX_LENGTH});
    assertFailure(new Response().parse(readBufferString(`20 ${meta}`)), "LineTerminator");
  });

  it("is partial at the maximum length without a terminator", function () {
    assertPartial(new Response().parse(readBufferString(`20 ${"a".repeat(META_MAX_LENGTH)}`)));
  });

  it("uses the metadata limit of the context", function () {
    const context: DefaultParseContext = new DefaultParseContext({metaMaxLength: 4});
    assertComplete(new Response().parse(readBufferString("20 text\r\n"), context));
    assertFailure(new Response().parse(readBufferString("20 texts\r\n"), context), "LineTerminator");
  });

  it("is partial for every strict prefix of a frame", function () {
    const frame: Buffer = readBufferString("20 text/gemini; charset=utf-8\r\n");
    for (let end: number = 0; end < frame.length; end++) {
      const res: Response = new Response();
      assertPartial(res.parse(frame.subarray(0, end)));
      chai.assert.isUndefined(res.status, `prefix of ${end} bytes`);
      chai.assert.isUndefined(res.meta, `prefix of ${end} bytes`);
    }
    assertComplete(new Response().parse(frame));
  });
});

describe("parseResponse", function () {
  it("returns the header and the frame length", function () {
    const frame: ResponseFrame = assertComplete(parseResponse(readBufferString("10 Enter a query\r\nbody")));
    chai.assert.deepEqual(frame, {status: 10, meta: "Enter a query", byteLength: 18});
  });
});
