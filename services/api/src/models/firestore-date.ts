/**
 * Firestore stores Date values as Timestamps; models read them back as Date
 */

import { z } from 'zod';
import { Timestamp } from '@google-cloud/firestore';

export const FirestoreDateSchema = z
  .custom<Date | Timestamp>((value) => value instanceof Date || value instanceof Timestamp)
  .transform((value) => (value instanceof Timestamp ? value.toDate() : value));
