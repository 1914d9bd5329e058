// File: src/services/index.ts
// Export all services

// Organization service - walks the organization tree to find member accounts
export * from './organization'

// STS service - assumeRole for temporary credentials in member accounts
export * from './sts'

// EC2 service - region discovery and the virtual-networking collectors
export * from './ec2'

// ELB service - Application/Network/Gateway load balancer collector
export * from './elb'

// S3 service - stores the documentation object
export * from './s3'

// Documentation service - per-account orchestration and the full pipeline
export * from './documentation'
