export class User {
  constructor(
    readonly username: string,
    readonly passwordHash: string,
  ) {}
}
