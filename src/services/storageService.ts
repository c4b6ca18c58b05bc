import fs from 'fs';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { applicationDefault, cert, getApp, getApps, initializeApp } from 'firebase-admin/app';
import type { App } from 'firebase-admin/app';
import { getStorage } from 'firebase-admin/storage';
import type { Env, StorageBackend } from '../config';

/** Write sink for the raw payload. */
export interface ObjectStore {
  put(bucket: string, key: string, body: string): Promise<void>;
}

export interface PutObjectSender {
  send(command: PutObjectCommand): Promise<unknown>;
}

export class S3ObjectStore implements ObjectStore {
  constructor(private client: PutObjectSender = new S3Client({})) {}

  /**
   * Upload one object. No content type or metadata is set.
   * @param bucket S3 bucket name
   * @param key Full object key, prefix included
   * @param body Serialized payload
   */
  async put(bucket: string, key: string, body: string): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body
      }));

      console.log(`Uploaded s3://${bucket}/${key}`);
    } catch (error) {
      console.error(`Error uploading object to S3 bucket ${bucket}:`, error);
      throw error;
    }
  }
}

function initializeFirebase(serviceAccountPath?: string): App {
  if (getApps().length > 0) {
    return getApp();
  }

  if (!serviceAccountPath) {
    return initializeApp({ credential: applicationDefault() });
  }

  if (!fs.existsSync(serviceAccountPath)) {
    console.error(`Firebase service account file not found at: ${serviceAccountPath}`);
    throw new Error('Firebase service account file not found');
  }

  const app = initializeApp({ credential: cert(serviceAccountPath) });
  console.log('Firebase initialized successfully');
  return app;
}

export class FirebaseObjectStore implements ObjectStore {
  constructor(private serviceAccountPath?: string) {}

  async put(bucket: string, key: string, body: string): Promise<void> {
    try {
      const app = initializeFirebase(this.serviceAccountPath);
      await getStorage(app).bucket(bucket).file(key).save(body);

      console.log(`Uploaded gs://${bucket}/${key}`);
    } catch (error) {
      console.error(`Error uploading object to Cloud Storage bucket ${bucket}:`, error);
      throw error;
    }
  }
}

export function createObjectStore(backend: StorageBackend, env: Env = process.env): ObjectStore {
  switch (backend) {
    case 'firebase':
      return new FirebaseObjectStore(env.FIREBASE_SERVICE_ACCOUNT_PATH);
    case 's3':
      return new S3ObjectStore();
  }
}
