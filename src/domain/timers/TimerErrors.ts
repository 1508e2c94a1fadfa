export class TimerError extends Error {
  constructor(
    message: string,
    readonly code: string = "TIMER_ERROR"
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidArgumentError extends TimerError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
  }
}
