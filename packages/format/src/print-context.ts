/**
 * State shared by the elements of one print call.
 */
export class PrintContext {
  constructor(readonly locale: string) {
    Object.freeze(this);
  }
}
