import fs from 'node:fs';
import admin from 'firebase-admin';
import { getEnv } from './env.js';

let app: admin.app.App | undefined;

function readServiceAccount(): admin.ServiceAccount | undefined {
  const env = getEnv();

  // Inline JSON wins over a path so CI can inject credentials without a file.
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    return JSON.parse(env.FIREBASE_SERVICE_ACCOUNT_JSON) as admin.ServiceAccount;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    return JSON.parse(
      fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' })
    ) as admin.ServiceAccount;
  }

  return undefined;
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const serviceAccount = readServiceAccount();
  if (serviceAccount) {
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    return app;
  }

  // Fallback to ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: getEnv().FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  initFirebaseApp();
  return admin.firestore();
}
