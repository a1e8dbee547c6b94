import { Response } from 'express';

/**
 * Status assumed until a status line is written; a body without an explicit
 * status goes out as 200.
 */
export const DEFAULT_STATUS = 200;

/**
 * Observes the status code a response actually sends.
 *
 * Node funnels every status line (explicit `writeHead`, or the implicit one
 * issued by the first body write) through `res.writeHead`, so decorating that
 * single method is enough. Everything else on the response is untouched.
 */
export class ResponseStatusRecorder {
  private recordedStatus = DEFAULT_STATUS;
  private headWritten = false;

  constructor(res: Response) {
    const originalWriteHead = res.writeHead;

    res.writeHead = (statusCode: number, ...rest: unknown[]) => {
      // A repeated call still reaches Node, which rejects it
      Reflect.apply(originalWriteHead, res, [statusCode, ...rest]);

      if (!this.headWritten) {
        this.recordedStatus = statusCode;
        this.headWritten = true;
      }
      return res;
    };
  }

  /**
   * First status sent, or 200 if nothing was written yet
   */
  get status(): number {
    return this.recordedStatus;
  }

  get written(): boolean {
    return this.headWritten;
  }
}
