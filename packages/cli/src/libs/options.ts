import { InvalidArgumentError } from "commander"

export function parseSeconds(value: string): number {
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds.")
  }
  return seconds
}

export function parsePort(value: string): number {
  const port = Number.parseInt(value, 10)
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Expected a port between 0 and 65535.")
  }
  return port
}
