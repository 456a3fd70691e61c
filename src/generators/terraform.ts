/**
 * Terraform generator
 *
 * Renders an AWS project: one EC2 instance per enabled service running the
 * service container, a shared security group for the published ports, and
 * the variables, outputs and provider configuration around them.
 */

import type { GeneratedFile, ProjectConfig, ServiceConfig } from "../types/project.js";
import type { ValidationCollector } from "../utils/validation.js";
import { BaseGenerator } from "./base.js";
import { formatVolumeMapping } from "./format.js";
import {
  escapeHclTemplate,
  hclString,
  indent,
  shellQuote,
  sortedEntries,
  toIdentifier,
} from "../utils/strings.js";

const DEFAULT_REGION = "us-east-1";
const DEFAULT_INSTANCE_TYPE = "t3.micro";

/**
 * Terraform identifier for a service: the variable prefix, restricted to HCL identifier characters
 */
export function terraformIdentifier(name: string): string {
  const id = toIdentifier(name).replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(id) ? `_${id}` : id;
}

interface IngressRule {
  port: number;
  protocol: string;
  services: string[];
}

/**
 * Terraform generator
 */
export class TerraformGenerator extends BaseGenerator {
  readonly target = "terraform" as const;

  protected override checkTarget(config: ProjectConfig, errors: ValidationCollector): void {
    const identifiers = new Map<string, string>();

    config.services.forEach((service, i) => {
      if (service.enabled && service.name !== "") {
        const id = terraformIdentifier(service.name);
        const owner = identifiers.get(id);
        if (owner !== undefined && owner !== service.name) {
          errors.add(
            `services[${i}].name`,
            `resource name '${id}' is already used by service '${owner}'`,
            service.name,
          );
        } else {
          identifiers.set(id, service.name);
        }
      }

      service.ports.forEach((port, j) => {
        if (!Number.isInteger(port.container) || port.container < 1 || port.container > 65535) {
          errors.add(
            `services[${i}].ports[${j}].container`,
            "container port must be between 1 and 65535",
            port.container,
          );
        }
      });
    });
  }

  protected render(config: ProjectConfig): GeneratedFile[] {
    const services = config.services.filter((service) => service.enabled);

    return [
      this.file("main.tf", this.generateMainTf(config, services)),
      this.file("variables.tf", this.generateVariablesTf(config, services)),
      this.file("outputs.tf", this.generateOutputsTf(config, services)),
      this.file("provider.tf", this.generateProviderTf(config)),
    ];
  }

  private header(config: ProjectConfig, title: string): string[] {
    return [`# ${config.name} - ${title}`, "# Generated by infragen", ""];
  }

  private generateMainTf(config: ProjectConfig, services: ServiceConfig[]): string {
    const lines = [
      ...this.header(config, "Compute resources"),
      'data "aws_ami" "ubuntu" {',
      "  most_recent = true",
      '  owners      = ["099720109477"]',
      "",
      "  filter {",
      '    name   = "name"',
      '    values = ["ubuntu/images/hvm-ssd/ubuntu-jammy-22.04-amd64-server-*"]',
      "  }",
      "}",
      "",
      ...this.securityGroupBlock(services),
    ];

    for (const service of services) {
      lines.push("", ...this.instanceBlock(service));
    }

    return lines.join("\n") + "\n";
  }

  private securityGroupBlock(services: ServiceConfig[]): string[] {
    const lines = [
      'resource "aws_security_group" "services" {',
      '  name        = "${var.project_name}-${var.environment}"',
      '  description = "Published service ports"',
    ];

    for (const rule of this.ingressRules(services)) {
      lines.push(
        "",
        "  ingress {",
        `    description = ${hclString(rule.services.join(", "))}`,
        `    from_port   = ${rule.port}`,
        `    to_port     = ${rule.port}`,
        `    protocol    = ${hclString(rule.protocol)}`,
        '    cidr_blocks = ["0.0.0.0/0"]',
        "  }",
      );
    }

    lines.push(
      "",
      "  egress {",
      "    from_port   = 0",
      "    to_port     = 0",
      '    protocol    = "-1"',
      '    cidr_blocks = ["0.0.0.0/0"]',
      "  }",
      "}",
    );
    return lines;
  }

  /**
   * One rule per distinct port and protocol, in service order
   */
  private ingressRules(services: ServiceConfig[]): IngressRule[] {
    const rules = new Map<string, IngressRule>();

    for (const service of services) {
      for (const port of service.ports) {
        const protocol = port.protocol?.toLowerCase() === "udp" ? "udp" : "tcp";
        const key = `${port.container}/${protocol}`;
        const existing = rules.get(key);
        if (existing) {
          if (!existing.services.includes(service.name)) existing.services.push(service.name);
        } else {
          rules.set(key, { port: port.container, protocol, services: [service.name] });
        }
      }
    }

    return [...rules.values()];
  }

  private instanceBlock(service: ServiceConfig): string[] {
    const id = terraformIdentifier(service.name);
    const quotedName = hclString(service.name).slice(1, -1);

    return [
      `resource "aws_instance" "${id}" {`,
      "  ami                    = coalesce(var.ami_id, data.aws_ami.ubuntu.id)",
      "  instance_type          = var.instance_type",
      "  vpc_security_group_ids = [aws_security_group.services.id]",
      "",
      "  user_data = <<-EOT",
      indent(this.userData(service).join("\n"), 4),
      "  EOT",
      "",
      "  tags = {",
      `    Name        = "\${var.project_name}-${quotedName}"`,
      `    Service     = ${hclString(service.name)}`,
      `    Type        = ${hclString(service.type)}`,
      "  }",
      "}",
    ];
  }

  /**
   * Boot script: install Docker, then run the service container
   */
  private userData(service: ServiceConfig): string[] {
    const script = [
      "#!/bin/bash",
      "set -euo pipefail",
      "apt-get update -y",
      "apt-get install -y docker.io",
      "systemctl enable --now docker",
    ];

    if (!service.image) {
      return script;
    }

    const args = [
      "docker run -d",
      `--name ${shellQuote(service.name)}`,
      "--restart unless-stopped",
    ];

    for (const port of service.ports) {
      const suffix = port.protocol?.toLowerCase() === "udp" ? "/udp" : "";
      args.push(`-p ${port.container}:${port.container}${suffix}`);
    }
    for (const volume of service.volumes) {
      args.push(`-v ${shellQuote(formatVolumeMapping(volume, { withMode: true }))}`);
    }
    for (const [key, value] of sortedEntries(service.environment)) {
      args.push(`-e ${shellQuote(`${key}=${value}`)}`);
    }

    const command = escapeHclTemplate(args.join(" "));
    script.push(`${command} \${var.${terraformIdentifier(service.name)}_image}`);
    return script;
  }

  private generateVariablesTf(config: ProjectConfig, services: ServiceConfig[]): string {
    const lines = [
      ...this.header(config, "Variables"),
      ...this.variableBlock("project_name", "Name of the project", config.name),
      "",
      ...this.variableBlock(
        "environment",
        "Deployment environment",
        config.environment ?? "development",
      ),
      "",
      ...this.variableBlock("region", "AWS region to deploy into", DEFAULT_REGION),
      "",
      ...this.variableBlock(
        "instance_type",
        "EC2 instance type for every service",
        DEFAULT_INSTANCE_TYPE,
      ),
      "",
      ...this.variableBlock(
        "ami_id",
        "AMI for every instance; empty selects the latest Ubuntu 22.04 image",
        "",
      ),
    ];

    for (const service of services) {
      if (!service.image) continue;
      lines.push(
        "",
        ...this.variableBlock(
          `${terraformIdentifier(service.name)}_image`,
          `Container image for ${service.name}`,
          service.image,
        ),
      );
    }

    return lines.join("\n") + "\n";
  }

  private variableBlock(name: string, description: string, defaultValue: string): string[] {
    return [
      `variable "${name}" {`,
      `  description = ${hclString(description)}`,
      "  type        = string",
      `  default     = ${hclString(defaultValue)}`,
      "}",
    ];
  }

  private generateOutputsTf(config: ProjectConfig, services: ServiceConfig[]): string {
    const lines = this.header(config, "Outputs");

    services.forEach((service, i) => {
      const id = terraformIdentifier(service.name);
      const primary = service.ports[0];
      const port = primary ? `:${primary.container}` : "";

      if (i > 0) lines.push("");
      lines.push(
        `output "${id}_url" {`,
        `  description = ${hclString(`URL of the ${service.name} service`)}`,
        `  value       = "http://\${aws_instance.${id}.public_ip}${port}"`,
        "}",
      );
    });

    return lines.join("\n") + "\n";
  }

  private generateProviderTf(config: ProjectConfig): string {
    return [
      ...this.header(config, "Provider configuration"),
      "terraform {",
      '  required_version = ">= 1.5.0"',
      "",
      "  required_providers {",
      "    aws = {",
      '      source  = "hashicorp/aws"',
      '      version = "~> 5.0"',
      "    }",
      "  }",
      "}",
      "",
      'provider "aws" {',
      "  region = var.region",
      "",
      "  default_tags {",
      "    tags = {",
      "      Project     = var.project_name",
      "      Environment = var.environment",
      '      ManagedBy   = "terraform"',
      "    }",
      "  }",
      "}",
    ].join("\n") + "\n";
  }
}

/**
 * Create a Terraform generator
 */
export function createTerraformGenerator(): TerraformGenerator {
  return new TerraformGenerator();
}
