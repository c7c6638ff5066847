import { DictionaryStore } from '..'
import type { SchemaSource } from '..'

export const FIX44_SOURCE: SchemaSource = {
  type: 'FIX',
  major: '4',
  minor: '4',
  fields: [
    { number: '8', name: 'BeginString' },
    { number: '11', name: 'ClOrdID' },
    {
      number: '35',
      name: 'MsgType',
      values: [
        { enum: '0', description: 'Heartbeat' },
        { enum: 'D', description: 'NewOrderSingle' },
      ],
    },
    { number: '38', name: 'OrderQty' },
    {
      number: '54',
      name: 'Side',
      values: [
        { enum: '1', description: 'Buy' },
        { enum: '2', description: 'Sell' },
      ],
    },
    { number: '55', name: 'Symbol' },
  ],
}

export const FIX42_SOURCE: SchemaSource = {
  type: 'FIX',
  major: '4',
  minor: '2',
  fields: [
    { number: '8', name: 'BeginString' },
    { number: '35', name: 'MsgType', values: [{ enum: 'D', description: 'ORDER_SINGLE' }] },
  ],
}

export function sampleStore(): DictionaryStore {
  return DictionaryStore.load({ 'FIX.4.4': FIX44_SOURCE, 'FIX.4.2': FIX42_SOURCE })
}

export const SOH = '\x01'

export function soh(...pairs: string[]): string {
  return pairs.join(SOH) + SOH
}
