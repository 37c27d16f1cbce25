import YAML from 'yaml'

export interface TraefikTlsFiles {
  certFile: string
  keyFile: string
}

/**
 * Renders a Traefik dynamic configuration document that adds one certificate to the default
 * TLS store.
 */
export const renderTraefikTlsConfig = ({ certFile, keyFile }: TraefikTlsFiles): string =>
  YAML.stringify({
    tls: {
      certificates: [
        {
          certFile,
          keyFile,
          stores: ['default'],
        },
      ],
    },
  })
