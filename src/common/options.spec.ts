import assert from "assert"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"

import { InvalidConfigurationError } from "./errors/InvalidConfigurationError.js"
import { MutualTLSChannelError } from "./errors/MutualTLSChannelError.js"
import {
  defaultClientCertSource,
  getDefaultMtlsEndpoint,
  resolveClientOptions,
  withDefaultPort,
  type ClientCertSource,
} from "./options.js"

const endpoints = {
  defaultEndpoint: "dataproc.googleapis.com",
  defaultMtlsEndpoint: "dataproc.mtls.googleapis.com",
}

const certSource: ClientCertSource = () => ({
  certChain: Buffer.from("cert"),
  privateKey: Buffer.from("key"),
})

describe("getDefaultMtlsEndpoint", function () {
  const cases: Array<[string, string]> = [
    ["example.googleapis.com", "example.mtls.googleapis.com"],
    ["example.mtls.googleapis.com", "example.mtls.googleapis.com"],
    ["example.sandbox.googleapis.com", "example.mtls.sandbox.googleapis.com"],
    ["example.mtls.sandbox.googleapis.com", "example.mtls.sandbox.googleapis.com"],
    ["api.example.com", "api.example.com"],
  ]

  for (const [endpoint, expected] of cases) {
    it(`should map ${endpoint} to ${expected}`, function () {
      assert.strictEqual(getDefaultMtlsEndpoint(endpoint), expected)
    })
  }

  it("should pass through a missing endpoint", function () {
    assert.strictEqual(getDefaultMtlsEndpoint(undefined), undefined)
  })
})

describe("withDefaultPort", function () {
  it("should append port 443 to a bare host", function () {
    assert.strictEqual(withDefaultPort("dataproc.googleapis.com"), "dataproc.googleapis.com:443")
  })

  it("should keep an explicit port", function () {
    assert.strictEqual(withDefaultPort("localhost:8080"), "localhost:8080")
  })
})

describe("resolveClientOptions", function () {
  it("should use the default endpoint without configuration", function () {
    const resolved = resolveClientOptions({}, endpoints, {})

    assert.deepStrictEqual(resolved, {
      host: "dataproc.googleapis.com:443",
      credentials: { type: "anonymous" },
      clientCertSource: undefined,
      quotaProjectId: undefined,
      insecure: false,
    })
  })

  it("should prefer an explicit api endpoint", function () {
    const env = { GOOGLE_API_USE_MTLS_ENDPOINT: "always" }

    assert.strictEqual(
      resolveClientOptions({ apiEndpoint: "localhost:8080" }, endpoints, env).host,
      "localhost:8080",
    )
    assert.strictEqual(
      resolveClientOptions({ apiEndpoint: "dataproc.example.com" }, endpoints, env).host,
      "dataproc.example.com:443",
    )
  })

  it("should pass quota project and insecure through", function () {
    const resolved = resolveClientOptions(
      { quotaProjectId: "billing-project", insecure: true },
      endpoints,
      {},
    )

    assert.strictEqual(resolved.quotaProjectId, "billing-project")
    assert.strictEqual(resolved.insecure, true)
  })

  describe("GOOGLE_API_USE_MTLS_ENDPOINT", function () {
    it("should use the regular endpoint when never", function () {
      const resolved = resolveClientOptions({ clientCertSource: certSource }, endpoints, {
        GOOGLE_API_USE_MTLS_ENDPOINT: "never",
        GOOGLE_API_USE_CLIENT_CERTIFICATE: "true",
      })

      assert.strictEqual(resolved.host, "dataproc.googleapis.com:443")
      assert.strictEqual(resolved.clientCertSource, certSource)
    })

    it("should use the mTLS endpoint when always", function () {
      const resolved = resolveClientOptions({}, endpoints, {
        GOOGLE_API_USE_MTLS_ENDPOINT: "always",
      })

      assert.strictEqual(resolved.host, "dataproc.mtls.googleapis.com:443")
      assert.strictEqual(resolved.clientCertSource, undefined)
    })

    it("should use the mTLS endpoint when auto and a certificate is available", function () {
      const resolved = resolveClientOptions({ clientCertSource: certSource }, endpoints, {
        GOOGLE_API_USE_CLIENT_CERTIFICATE: "true",
      })

      assert.strictEqual(resolved.host, "dataproc.mtls.googleapis.com:443")
      assert.strictEqual(resolved.clientCertSource, certSource)
    })

    it("should use the regular endpoint when auto and no certificate is available", function () {
      const resolved = resolveClientOptions({}, endpoints, {
        GOOGLE_API_USE_MTLS_ENDPOINT: "auto",
        GOOGLE_API_USE_CLIENT_CERTIFICATE: "true",
      })

      assert.strictEqual(resolved.host, "dataproc.googleapis.com:443")
      assert.strictEqual(resolved.clientCertSource, undefined)
    })

    it("should reject an unsupported value", function () {
      assert.throws(
        () =>
          resolveClientOptions({}, endpoints, { GOOGLE_API_USE_MTLS_ENDPOINT: "sometimes" }),
        MutualTLSChannelError,
      )
    })
  })

  describe("GOOGLE_API_USE_CLIENT_CERTIFICATE", function () {
    it("should ignore a certificate source unless true", function () {
      const resolved = resolveClientOptions({ clientCertSource: certSource }, endpoints, {
        GOOGLE_API_USE_CLIENT_CERTIFICATE: "false",
      })

      assert.strictEqual(resolved.host, "dataproc.googleapis.com:443")
      assert.strictEqual(resolved.clientCertSource, undefined)
    })

    it("should fall back to the default certificate source", function () {
      const resolved = resolveClientOptions({}, endpoints, {
        GOOGLE_API_USE_CLIENT_CERTIFICATE: "true",
        DATAPROC_CLIENT_CERT: "/nonexistent/cert.pem",
        DATAPROC_CLIENT_KEY: "/nonexistent/key.pem",
      })

      assert.strictEqual(resolved.host, "dataproc.mtls.googleapis.com:443")
      assert.strictEqual(typeof resolved.clientCertSource, "function")
    })

    it("should reject a value other than true or false", function () {
      assert.throws(
        () =>
          resolveClientOptions({}, endpoints, { GOOGLE_API_USE_CLIENT_CERTIFICATE: "yes" }),
        (error: unknown) => {
          assert.ok(error instanceof InvalidConfigurationError)
          assert.strictEqual(
            error.message,
            "environment variable GOOGLE_API_USE_CLIENT_CERTIFICATE must be `true` or `false`",
          )
          return true
        },
      )
    })
  })

  it("should resolve credentials from the environment", function () {
    const resolved = resolveClientOptions({}, endpoints, {
      DATAPROC_ACCESS_TOKEN: "test-token",
    })

    assert.deepStrictEqual(resolved.credentials, { type: "access_token", token: "test-token" })
  })
})

describe("default client certificate source", function () {
  let dir: string

  before(function () {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dataproc-client-cert-"))
    fs.writeFileSync(path.join(dir, "cert.pem"), "test-cert")
    fs.writeFileSync(path.join(dir, "key.pem"), "test-key")
  })

  after(function () {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it("should need both the certificate and the key", function () {
    assert.strictEqual(defaultClientCertSource({}), undefined)
    assert.strictEqual(defaultClientCertSource({ DATAPROC_CLIENT_CERT: "cert.pem" }), undefined)
    assert.strictEqual(
      typeof defaultClientCertSource({
        DATAPROC_CLIENT_CERT: "cert.pem",
        DATAPROC_CLIENT_KEY: "key.pem",
      }),
      "function",
    )
    assert.strictEqual(defaultClientCertSource({ DATAPROC_CLIENT_KEY: "key.pem" }), undefined)
  })

  it("should read the files when called", function () {
    const source = defaultClientCertSource({
      DATAPROC_CLIENT_CERT: path.join(dir, "cert.pem"),
      DATAPROC_CLIENT_KEY: path.join(dir, "key.pem"),
    })
    assert.ok(source)

    const { certChain, privateKey } = source()

    assert.strictEqual(certChain.toString(), "test-cert")
    assert.strictEqual(privateKey.toString(), "test-key")
  })
})
