// SPDX-License-Identifier: Apache-2.0

/**
 * Identifies the object that owns a resource. Kubernetes garbage collects the resource together with its owner.
 */
export interface OwnerReference {
  readonly apiVersion: string;
  readonly kind: string;
  readonly name: string;
  readonly uid: string;
  readonly controller?: boolean;
  readonly blockOwnerDeletion?: boolean;
}
