/**
 * Batched writes over document references, chunked under the Firestore batch limit
 */

import type { DocumentReference, Firestore } from '@google-cloud/firestore';
import { MAX_BATCH_WRITES } from '../../../../shared/types';

export async function deleteInBatches(db: Firestore, refs: DocumentReference[]): Promise<number> {
  for (let start = 0; start < refs.length; start += MAX_BATCH_WRITES) {
    const batch = db.batch();
    refs.slice(start, start + MAX_BATCH_WRITES).forEach((ref) => batch.delete(ref));
    await batch.commit();
  }
  return refs.length;
}
