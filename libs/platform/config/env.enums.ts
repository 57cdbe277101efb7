export enum NodeEnv {
  Development = 'development',
  Test = 'test',
  Staging = 'staging',
  Production = 'production',
}

export enum StoreFailurePolicy {
  Open = 'open',
  Closed = 'closed',
}
