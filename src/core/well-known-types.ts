export const WellKnownTypeNames = {
  SystemObject: 'System.Object',
  SystemBoolean: 'System.Boolean',
  SystemIDisposable: 'System.IDisposable',
  SystemIntPtr: 'System.IntPtr',
  SystemUIntPtr: 'System.UIntPtr',
  SystemRuntimeInteropServicesHandleRef: 'System.Runtime.InteropServices.HandleRef',
  SystemNetSecurityRemoteCertificateValidationCallback: 'System.Net.Security.RemoteCertificateValidationCallback',
  SystemNetSecuritySslPolicyErrors: 'System.Net.Security.SslPolicyErrors',
  SystemSecurityCryptographyX509CertificatesX509Certificate:
    'System.Security.Cryptography.X509Certificates.X509Certificate',
  SystemSecurityCryptographyX509CertificatesX509Chain: 'System.Security.Cryptography.X509Certificates.X509Chain'
} as const;

export type WellKnownTypeName = (typeof WellKnownTypeNames)[keyof typeof WellKnownTypeNames];
