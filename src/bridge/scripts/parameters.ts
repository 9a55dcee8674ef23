/**
 * parameters.ts — Parameter read/write PowerShell templates
 *
 * Every script attaches to the running application, works on its active
 * document, and releases the COM handle in a finally block whatever happens.
 * Output is a single JSON value: the result, or { error, code }.
 */

import { quoteForPowerShell } from "../executor.js";

/** DocumentTypeEnum values for part and assembly documents */
const PART_DOCUMENT = 12291;
const ASSEMBLY_DOCUMENT = 12292;

const HELPERS = `
function Get-ParameterGroups($params) {
  @(
    @{ kind = 'model'; items = $params.ModelParameters },
    @{ kind = 'user'; items = $params.UserParameters },
    @{ kind = 'reference'; items = $params.ReferenceParameters },
    @{ kind = 'table'; items = $params.TableParameters }
  )
}

function Get-ParameterInfo($p, [string]$kind) {
  [ordered]@{
    name = $p.Name
    value = $p.Value
    unit = $p.Units
    expression = $p.Expression
    comment = $p.Comment
    kind = $kind
    isReadOnly = ($kind -eq 'reference' -or $kind -eq 'table')
  }
}

function Find-Parameter($params, [string]$name) {
  foreach ($group in (Get-ParameterGroups $params)) {
    foreach ($p in $group.items) {
      if ($p.Name -ceq $name) { return @{ param = $p; kind = $group.kind } }
    }
  }
  return $null
}
`;

/**
 * Wrap a script body with application/document acquisition and release.
 * The body sees $app, $doc, $docInfo and $params, and assigns $result.
 */
export function withActiveDocument(progId: string, body: string): string {
  const id = quoteForPowerShell(progId);
  return `$ErrorActionPreference = 'Stop'
[Console]::OutputEncoding = [System.Text.Encoding]::UTF8
${HELPERS}
$result = $null
$app = $null
try {
  try {
    $app = [System.Runtime.InteropServices.Marshal]::GetActiveObject(${id})
  } catch {
    $result = @{ error = 'CAD application is not running (' + ${id} + ')'; code = 'unavailable' }
  }
  if ($app) {
    $doc = $app.ActiveDocument
    if ($null -eq $doc) {
      $result = @{ error = 'No document is open'; code = 'no_document' }
    } elseif ($doc.DocumentType -ne ${PART_DOCUMENT} -and $doc.DocumentType -ne ${ASSEMBLY_DOCUMENT}) {
      $result = @{ error = 'Active document is not a part or assembly'; code = 'unsupported_document' }
    } else {
      $docInfo = [ordered]@{
        name = $doc.DisplayName
        fullPath = $doc.FullFileName
        type = $(if ($doc.DocumentType -eq ${PART_DOCUMENT}) { 'part' } else { 'assembly' })
      }
      $params = $doc.ComponentDefinition.Parameters
      try {
${body}
      } catch {
        $result = @{ error = $_.Exception.Message; code = 'host_error' }
      }
    }
  }
} finally {
  if ($app) { [void][System.Runtime.InteropServices.Marshal]::ReleaseComObject($app) }
}
ConvertTo-Json -InputObject $result -Compress -Depth 6`;
}

export function getDocumentScript(progId: string): string {
  return withActiveDocument(progId, `        $result = $docInfo`);
}

export function listParametersScript(progId: string): string {
  return withActiveDocument(
    progId,
    `        $list = New-Object System.Collections.ArrayList
        foreach ($group in (Get-ParameterGroups $params)) {
          foreach ($p in $group.items) {
            [void]$list.Add((Get-ParameterInfo $p $group.kind))
          }
        }
        $result = [ordered]@{ document = $docInfo; parameters = $list.ToArray() }`,
  );
}

/**
 * Look up one parameter by (case-sensitive) name, optionally run a statement
 * against it as $found.param, and return its fresh description.
 */
function parameterScript(
  progId: string,
  name: string,
  update?: { statement: string; requireWritable: boolean },
): string {
  const n = quoteForPowerShell(name);
  const guard = update?.requireWritable
    ? `
        } elseif ($found.kind -eq 'reference' -or $found.kind -eq 'table') {
          $result = @{ error = 'Parameter is read-only: ' + ${n}; code = 'read_only' }`
    : "";
  const apply = update ? `
          ${update.statement}` : "";
  return withActiveDocument(
    progId,
    `        $found = Find-Parameter $params ${n}
        if ($null -eq $found) {
          $result = @{ error = 'Parameter not found: ' + ${n}; code = 'not_found' }${guard}
        } else {${apply}
          $result = Get-ParameterInfo $found.param $found.kind
        }`,
  );
}

export function getParameterScript(progId: string, name: string): string {
  return parameterScript(progId, name);
}

export function setValueScript(progId: string, name: string, value: number): string {
  return parameterScript(progId, name, {
    statement: `$found.param.Value = [double]${quoteForPowerShell(String(value))}; $doc.Update()`,
    requireWritable: true,
  });
}

export function setExpressionScript(progId: string, name: string, expression: string): string {
  return parameterScript(progId, name, {
    statement: `$found.param.Expression = ${quoteForPowerShell(expression)}; $doc.Update()`,
    requireWritable: true,
  });
}

/** Comments are writable on driven parameters as well. */
export function setCommentScript(progId: string, name: string, comment: string): string {
  return parameterScript(progId, name, {
    statement: `$found.param.Comment = ${quoteForPowerShell(comment)}`,
    requireWritable: false,
  });
}
