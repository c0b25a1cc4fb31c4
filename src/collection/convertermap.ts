import { Converter } from './converter.js'
import { TextConverter } from './textConverter.js'
import { NumberConverter } from './numberConverter.js'
import { DateConverter } from './dateConverter.js'
import { BooleanConverter } from './booleanConverter.js'
import { SelectConverter } from './selectConverter.js'
import { FieldType, Ifield } from '../shared/collection/index.js'

export class ConverterMap extends Map<FieldType, Converter> {
  private static converterMap = new ConverterMap()

  static getFieldTypes(): FieldType[] {
    return Array.from(ConverterMap.converterMap.keys())
  }

  static getConverter(field: Ifield): Converter {
    const cv = ConverterMap.converterMap.get(field.type)
    if (!cv) throw new Error('No converter for field type ' + field.type)
    return cv
  }
  private static _initialize = (() => {
    if (ConverterMap.converterMap.size == 0) {
      ConverterMap.converterMap.set(FieldType.text, new TextConverter())
      ConverterMap.converterMap.set(FieldType.number, new NumberConverter())
      ConverterMap.converterMap.set(FieldType.date, new DateConverter())
      ConverterMap.converterMap.set(FieldType.boolean, new BooleanConverter())
      ConverterMap.converterMap.set(FieldType.select, new SelectConverter())
    }
  })()
}
