export class EmailTakenError extends Error {
  constructor(readonly email: string) {
    super(`Email already registered: ${email}`)
    this.name = new.target.name
  }
}
