/* eslint-disable no-shadow */

export enum CertificateResourceVersion {
  v1 = 'v1',
}

export enum CertificateResourceGroup {
  Certificate = 'certificates',
}

export enum CertificateDomain {
  Group = 'cert-manager.io',
}
