import * as admin from 'firebase-admin';

export function initAdmin() {
  if (!admin.apps.length) {
    admin.initializeApp();
  }
}

export function getFirestoreDb() {
  initAdmin();
  return admin.firestore();
}
