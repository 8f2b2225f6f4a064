import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, describe, test } from "@dotgrid/testkit";
import { PrinterError } from "../errors.js";
import { openDeviceTransport } from "../transport.js";

async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), "dotgrid-transport-test-"));
  try {
    return await run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

describe("openDeviceTransport", () => {
  test("writes reach the device file", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "lp0");
      writeFileSync(path, "");
      const transport = await openDeviceTransport(path);
      assert.equal(await transport.write(Uint8Array.from([0x1b, 0x40, 0x0c])), 3);
      await transport.flush();
      await transport.close();
      assert.deepEqual(Array.from(readFileSync(path)), [0x1b, 0x40, 0x0c]);
    });
  });

  test("reads come from the device file", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "lp0");
      writeFileSync(path, Uint8Array.from([0x08]));
      const transport = await openDeviceTransport(path);
      const buf = new Uint8Array(1);
      assert.equal(await transport.read(buf), 1);
      assert.equal(buf[0], 0x08);
      assert.equal(await transport.read(buf), 0);
      await transport.close();
    });
  });

  test("a missing device is DEVICE_NOT_FOUND", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "nope");
      await assert.rejects(
        openDeviceTransport(path),
        (err: unknown) => err instanceof PrinterError && err.code === "DEVICE_NOT_FOUND" && err.path === path,
      );
    });
  });
});
