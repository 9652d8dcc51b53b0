export { h, isSameView, createElementFrom } from './node'
export type { ViewNode, ViewChild, AttrValue, ChildInput } from './node'
export { render, mount } from './sinks'
export { setDomErrorHandler, resetDomErrorHandler } from './error-handler'
export type { DomErrorHandler } from './error-handler'
