import { assert, describe, test } from "@dotgrid/testkit";
import { PrinterError, toPrinterError } from "../errors.js";
import { errnoError } from "../testing/mockTransport.js";

describe("toPrinterError", () => {
  test("maps permission errors", () => {
    const cause = errnoError("EACCES");
    const err = toPrinterError(cause, "/dev/usb/lp0");
    assert.equal(err.code, "PERMISSION");
    assert.equal(err.message, "Permission denied: /dev/usb/lp0");
    assert.equal(err.path, "/dev/usb/lp0");
    assert.equal(err.cause, cause);
    assert.equal(toPrinterError(errnoError("EPERM")).code, "PERMISSION");
  });

  test("maps missing devices", () => {
    const err = toPrinterError(errnoError("ENOENT"), "/dev/usb/lp9");
    assert.equal(err.code, "DEVICE_NOT_FOUND");
    assert.equal(err.message, "Printer device not found: /dev/usb/lp9");
  });

  test("maps broken pipes to DISCONNECTED", () => {
    assert.equal(toPrinterError(errnoError("EPIPE")).code, "DISCONNECTED");
  });

  test("everything else is IO", () => {
    const err = toPrinterError(errnoError("EIO", "input/output error"));
    assert.equal(err.code, "IO");
    assert.equal(err.message, "I/O error: input/output error");
    assert.equal(toPrinterError("boom").message, "I/O error: boom");
  });

  test("PrinterErrors pass through", () => {
    const existing = new PrinterError("TIMEOUT", "late", { timeoutMs: 5 });
    assert.equal(toPrinterError(existing), existing);
    assert.equal(existing.timeoutMs, 5);
    assert.equal(existing.validation, null);
    assert.equal(existing.name, "PrinterError");
  });
});
