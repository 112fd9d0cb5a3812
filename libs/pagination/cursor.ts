import { DocumentIdSchema } from '../store/documentStore.js';
import { ValidationError } from '../errors/errors.js';

/**
 * Cursor Codec.
 *
 * A cursor is the identifier of the last document of the previous page, in
 * its canonical external form. Decoding checks syntax only; it never reads
 * the store.
 */

export function encodeCursor(id: string): string {
    return id.toLowerCase();
}

export function decodeCursor(token: string): string {
    const result = DocumentIdSchema.safeParse(token);
    if (!result.success) {
        throw new ValidationError(`Invalid after_id cursor: ${JSON.stringify(token.slice(0, 64))}`, [
            { field: 'after_id', message: 'must be a cursor returned by a previous page' }
        ]);
    }
    return result.data;
}
