/**
 * Hub wire protocol constants
 *
 * Frame: [length, hubId, messageType, ...body]
 *   length      total frame length; values >= 128 take two bytes
 *               (low 7 bits | 0x80, then the remaining bits)
 *   hubId       always 0x00
 *   messageType one of MessageType below
 */

/** Every command is written to this characteristic handle */
export const HUB_HARDWARE_HANDLE = 0x0e;

export const HUB_ID = 0x00;

export const MessageType = {
  HUB_PROPERTIES: 0x01,
  HUB_ACTIONS: 0x02,
  HUB_ALERTS: 0x03,
  HUB_ATTACHED_IO: 0x04,
  GENERIC_ERROR: 0x05,
  PORT_INPUT_FORMAT_SETUP_SINGLE: 0x41,
  PORT_VALUE_SINGLE: 0x45,
  PORT_VALUE_COMBINED: 0x46,
  PORT_INPUT_FORMAT_SINGLE: 0x47,
  VIRTUAL_PORT_SETUP: 0x61,
  PORT_OUTPUT: 0x81,
  PORT_OUTPUT_FEEDBACK: 0x82,
} as const;

export const HubProperty = {
  ADVERTISE_NAME: 0x01,
  BUTTON: 0x02,
  FW_VERSION: 0x03,
  HW_VERSION: 0x04,
  RSSI: 0x05,
  VOLTAGE_PERC: 0x06,
  BATTERY_KIND: 0x07,
  MANUFACTURER: 0x08,
  RADIO_FW_VERSION: 0x09,
  WIRELESS_PROTO_VERSION: 0x0a,
  SYSTEM_TYPE_ID: 0x0b,
  HW_NETW_ID: 0x0c,
  PRIMARY_MAC: 0x0d,
  SECONDARY_MAC: 0x0e,
  HW_NETW_FAMILY: 0x0f,
} as const;

export const PropertyOperation = {
  SET: 0x01,
  UPD_ENABLE: 0x02,
  UPD_DISABLE: 0x03,
  RESET: 0x04,
  UPD_REQUEST: 0x05,
  UPSTREAM_UPDATE: 0x06,
} as const;

export const HubAction = {
  SWITCH_OFF: 0x01,
  DISCONNECT: 0x02,
  VCC_PORT_CONTROL_ON: 0x03,
  VCC_PORT_CONTROL_OFF: 0x04,
  BUSY_INDICATION_ON: 0x05,
  BUSY_INDICATION_OFF: 0x06,
  SWITCH_OFF_IMMEDIATELY: 0x2f,

  UPSTREAM_SHUTDOWN: 0x30,
  UPSTREAM_DISCONNECT: 0x31,
  UPSTREAM_BOOT_MODE: 0x32,
} as const;

export const HubAlert = {
  LOW_VOLTAGE: 0x01,
  HIGH_CURRENT: 0x02,
  LOW_SIGNAL: 0x03,
  OVER_POWER: 0x04,
} as const;

export const AlertOperation = {
  ENABLE: 0x01,
  DISABLE: 0x02,
  UPD_REQUEST: 0x03,
  UPSTREAM_UPDATE: 0x04,
} as const;

export const AttachEvent = {
  DETACHED: 0x00,
  ATTACHED: 0x01,
  ATTACHED_VIRTUAL: 0x02,
} as const;

export type AttachEventCode = (typeof AttachEvent)[keyof typeof AttachEvent];

/** I/O type ids reported in attach events */
export const DeviceType = {
  MOTOR: 0x0001,
  SYSTEM_TRAIN_MOTOR: 0x0002,
  BUTTON: 0x0005,
  LED_LIGHT: 0x0008,
  VOLTAGE: 0x0014,
  CURRENT: 0x0015,
  PIEZO_SOUND: 0x0016,
  RGB_LIGHT: 0x0017,
  TILT_EXTERNAL: 0x0022,
  MOTION_SENSOR: 0x0023,
  VISION_SENSOR: 0x0025,
  MOTOR_EXTERNAL_TACHO: 0x0026,
  MOTOR_INTERNAL_TACHO: 0x0027,
  TILT_INTERNAL: 0x0028,
} as const;

export const ErrorCode = {
  ACK: 0x01,
  MACK: 0x02,
  BUFFER_OVERFLOW: 0x03,
  TIMEOUT: 0x04,
  COMMAND_NOT_RECOGNIZED: 0x05,
  INVALID_USE: 0x06,
  OVERCURRENT: 0x07,
  INTERNAL_ERROR: 0x08,
} as const;

export const ERROR_DESCRIPTIONS: Record<number, string> = {
  [ErrorCode.ACK]: 'ACK',
  [ErrorCode.MACK]: 'MACK',
  [ErrorCode.BUFFER_OVERFLOW]: 'Buffer overflow',
  [ErrorCode.TIMEOUT]: 'Timeout',
  [ErrorCode.COMMAND_NOT_RECOGNIZED]: 'Command not recognized',
  [ErrorCode.INVALID_USE]: 'Invalid use',
  [ErrorCode.OVERCURRENT]: 'Overcurrent',
  [ErrorCode.INTERNAL_ERROR]: 'Internal error',
};

// Port output startup/completion flags (high nibble: startup, low nibble: completion)
export const STARTUP_IMMEDIATE = 0x10;
export const COMPLETION_FEEDBACK = 0x01;

export const OutputSubcommand = {
  START_POWER_DUAL: 0x02,
  START_SPEED_FOR_DEGREES: 0x0b,
  WRITE_DIRECT_MODE_DATA: 0x51,
} as const;

/** Bits of the per-port status byte in output feedback */
export const FeedbackStatus = {
  IN_PROGRESS: 0x01,
  COMPLETED: 0x02,
  DISCARDED: 0x04,
  IDLE: 0x08,
  BUSY_FULL: 0x10,
} as const;

export const VirtualPortOperation = {
  DISCONNECT: 0x00,
  CONNECT: 0x01,
} as const;
