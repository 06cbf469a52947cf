/**
 * What the caller hands to connect(): an address plus whatever the scan saw
 */
export interface LinkTarget {
  address: string
  name?: string
}

/**
 * Identity of the peer once the link is up
 */
export interface EndpointRef {
  address: string
  name?: string
  mtu?: number
}

export type DeviceClass = 'esp32' | 'nrf52' | 'generic'

export type CharacteristicId = 'toRadio' | 'fromRadio' | 'fromNum'

export const REQUIRED_CHARACTERISTICS: readonly CharacteristicId[] = ['toRadio', 'fromRadio', 'fromNum']
