export const constants = {
  CONFIG_FILE: 'netcfg.config.json',
  DEFAULT_CONSOLE_DRIVER: 'cli',
  DEFAULT_CONSOLE_COMMAND: 'netconify',
  DEFAULT_RPC_PORT: 830,
  DEFAULT_TELNET_PORT: 23,
  DEFAULT_SERIAL_DEVICE: '/dev/ttyUSB0'
} as const
