/* eslint-disable prettier/prettier */

/**
 * @file field-transport.ts
 * @description
 * Port over the wire protocol spoken with the field controller.
 *
 * The device link owns lifecycle policy (liveness, retry, reconnect);
 * a transport only knows how to open a session, probe it, read raw bytes
 * and close it. Implementations throw on failure; the link turns those
 * throws into typed results.
 */
export interface FieldTransport {
  /** Address shown in logs and status (e.g. `opc.tcp://plc:4840`). */
  readonly endpoint: string

  open(): Promise<void>

  close(): Promise<void>

  /** Cheap round-trip to confirm an existing session still answers. */
  isAlive(): Promise<boolean>

  readBlock(blockId: number, offset: number, size: number): Promise<Buffer>
}
