export namespace Session {
  export interface Credentials {
    /** Cookie jar bound to the crumb, sent back as the `Cookie` header. */
    readonly cookies: Readonly<Record<string, string>>;
    readonly crumb: string;
  }
}
