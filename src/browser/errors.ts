export class BrowserRegistryError extends Error {
  constructor(
    message: string,
    public readonly selector: string,
  ) {
    super(message)
    this.name = 'BrowserRegistryError'
  }
}

export class DevToolsConnectError extends Error {
  constructor(port: number, timeoutMs: number) {
    super(`Error connecting to dev tools interface on port ${port} within ${timeoutMs}ms`)
    this.name = 'DevToolsConnectError'
  }
}

export class NavigationError extends Error {
  constructor(
    public readonly url: string,
    reason: string,
  ) {
    super(`Navigation to ${url} failed: ${reason}`)
    this.name = 'NavigationError'
  }
}
