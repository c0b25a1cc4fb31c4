import { IvalidationIssue } from '../shared/collection/index.js'

export class CollectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

function issueText(issue: IvalidationIssue): string {
  let prefix = ''
  if (issue.row != undefined) prefix = 'row ' + issue.row + ': '
  if (issue.field != undefined) prefix = prefix + "field '" + issue.field + "': "
  return prefix + issue.message
}

/** Item or field data violates the collection schema */
export class ValidationError extends CollectionError {
  readonly issues: IvalidationIssue[]

  constructor(issues: IvalidationIssue[] | IvalidationIssue) {
    const list = Array.isArray(issues) ? issues : [issues]
    super(list.map(issueText).join('; '))
    this.issues = list
  }
}

/** File content does not match the collection file structure */
export class FormatError extends CollectionError {
  constructor(
    readonly reason: string,
    readonly line?: number,
    readonly path?: string
  ) {
    super((path ? path + ': ' : '') + (line != undefined ? 'line ' + line + ': ' : '') + reason)
  }

  withPath(path: string): FormatError {
    return new FormatError(this.reason, this.line, path)
  }
}

export class NotFoundError extends CollectionError {
  constructor(
    readonly collectionName: string,
    readonly itemId?: string
  ) {
    super(
      itemId != undefined
        ? "Item '" + itemId + "' not found in collection '" + collectionName + "'"
        : "Collection '" + collectionName + "' not found"
    )
  }
}
