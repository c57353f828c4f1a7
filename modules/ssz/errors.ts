export class SszInputError extends Error {
  status: number;
  field: string;
  constructor(message: string, field: string, status = 400) {
    super(message);
    this.status = status;
    this.field = field;
    this.name = "SszInputError";
  }
}

export class SszDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SszDomainError";
  }
}

export class GoldenDatasetError extends Error {
  filePath: string;
  constructor(message: string, filePath: string) {
    super(message);
    this.filePath = filePath;
    this.name = "GoldenDatasetError";
  }
}
