/**
 * packages/node/src/transport.ts — Byte transport to a printer.
 *
 * Why: The driver only needs four operations from a device, so tests swap the
 * real character device for an in-process MockTransport.
 *
 * Contract:
 *   - write() may accept fewer bytes than offered; it resolves to the count
 *   - read() resolves to the count read; 0 means end of stream
 *   - transient conditions reject with Node errno errors (EAGAIN, EINTR)
 */

import { type FileHandle, open } from "node:fs/promises";
import { resolvePrinterConfig } from "./config.js";
import { toPrinterError } from "./errors.js";

export interface PrinterTransport {
  write(bytes: Uint8Array): Promise<number>;
  read(buffer: Uint8Array): Promise<number>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

class DeviceTransport implements PrinterTransport {
  private readonly handle: FileHandle;
  readonly path: string;

  constructor(handle: FileHandle, path: string) {
    this.handle = handle;
    this.path = path;
  }

  async write(bytes: Uint8Array): Promise<number> {
    const { bytesWritten } = await this.handle.write(bytes, 0, bytes.byteLength, null);
    return bytesWritten;
  }

  async read(buffer: Uint8Array): Promise<number> {
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.byteLength, null);
    return bytesRead;
  }

  /** Writes go straight to the file descriptor; there is no user-space buffer to drain. */
  async flush(): Promise<void> {}

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Open a printer device for reading and writing. The path defaults to
 * DOTGRID_PRINTER_DEVICE, then /dev/usb/lp0.
 */
export async function openDeviceTransport(path?: string): Promise<PrinterTransport> {
  const devicePath = path ?? resolvePrinterConfig().devicePath;
  try {
    const handle = await open(devicePath, "r+");
    return new DeviceTransport(handle, devicePath);
  } catch (error) {
    throw toPrinterError(error, devicePath);
  }
}
