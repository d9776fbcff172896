/**
 * Export Status Value Object
 * Represents the state of an export record as reported by the NVR
 */
export enum ExportStatus {
  NOT_FOUND = 'NOT_FOUND',
  IN_PROGRESS = 'IN_PROGRESS',
  COMPLETE = 'COMPLETE',
  FAILED = 'FAILED',
}

export class ExportStatusVO {
  private constructor(private readonly _value: ExportStatus) {}

  static fromString(value: string): ExportStatusVO {
    const normalizedValue = value.toUpperCase();
    const match = Object.values(ExportStatus).find((status) => status === normalizedValue);
    if (!match) {
      throw new Error(`Invalid export status: ${value}`);
    }
    return new ExportStatusVO(match);
  }

  static notFound(): ExportStatusVO {
    return new ExportStatusVO(ExportStatus.NOT_FOUND);
  }

  static inProgress(): ExportStatusVO {
    return new ExportStatusVO(ExportStatus.IN_PROGRESS);
  }

  static complete(): ExportStatusVO {
    return new ExportStatusVO(ExportStatus.COMPLETE);
  }

  static failed(): ExportStatusVO {
    return new ExportStatusVO(ExportStatus.FAILED);
  }

  get value(): ExportStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return this._value === ExportStatus.COMPLETE || this._value === ExportStatus.FAILED;
  }

  isNotFound(): boolean {
    return this._value === ExportStatus.NOT_FOUND;
  }

  isInProgress(): boolean {
    return this._value === ExportStatus.IN_PROGRESS;
  }

  isComplete(): boolean {
    return this._value === ExportStatus.COMPLETE;
  }

  isFailed(): boolean {
    return this._value === ExportStatus.FAILED;
  }

  equals(other: ExportStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
